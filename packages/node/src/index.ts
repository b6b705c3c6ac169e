/**
 * @yamlpipe/node - Node.js adapter for yamlpipe
 *
 * Re-exports everything from @yamlpipe/core plus YAML file access.
 */

import { type ConfigurationError, YamlCodecLive } from "@yamlpipe/core";
import { Layer } from "effect";
import { makeNodeYamlFilesLayer, type YamlFiles } from "./node-adapter-layer.js";

// Re-export everything from core
export * from "@yamlpipe/core";
export { FileError } from "./errors.js";
export type { NodeAdapterConfig, YamlFilesShape } from "./node-adapter-layer.js";
// Export Node.js file access
export { makeNodeYamlFilesLayer, YamlFiles } from "./node-adapter-layer.js";

/**
 * YamlFiles over the default codec.
 */
export const NodeYamlFilesLive: Layer.Layer<YamlFiles, ConfigurationError> =
	makeNodeYamlFilesLayer().pipe(Layer.provide(YamlCodecLive));
