/**
 * Zod schema for PluginFactoryOptions. Validates the serialisable part of
 * the options and fills defaults.
 */

import { FactoryConfigurationError } from "@plugforge/errors";
import { z } from "zod";
import {
  DEFAULT_PACKAGE_NAME,
  DEFAULT_PLUGIN_ID_ATTRIBUTE,
  LOADING_MECHANISMS,
  LoadingMechanism,
} from "./constants.js";
import { createConsoleLogger } from "./logger.js";
import type { PluginFactoryOptions, ResolvedPluginFactoryOptions } from "./types.js";

export const LoadingMechanismSchema = z.enum(LOADING_MECHANISMS);

export const PluginFactoryOptionsSchema = z.object({
  paths: z.union([z.string(), z.array(z.string())]).optional(),
  packageName: z.string().min(1).optional(),
  pluginIdAttribute: z.string().min(1).optional(),
  versionIdAttribute: z.string().min(1).optional(),
  envVar: z.string().min(1).optional(),
  mechanism: LoadingMechanismSchema.optional(),
});

/**
 * Validates factory options and applies defaults.
 *
 * @throws {FactoryConfigurationError} listing every failing field as `path: message`
 */
export function resolveFactoryOptions(
  options: PluginFactoryOptions = {},
): ResolvedPluginFactoryOptions {
  const { logger, env, ...serialisable } = options;

  const parsed = PluginFactoryOptionsSchema.safeParse(serialisable);
  if (!parsed.success) {
    throw new FactoryConfigurationError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
    );
  }

  const config = parsed.data;
  const paths = typeof config.paths === "string" ? [config.paths] : (config.paths ?? []);

  return {
    paths,
    packageName: config.packageName ?? DEFAULT_PACKAGE_NAME,
    pluginIdAttribute: config.pluginIdAttribute ?? DEFAULT_PLUGIN_ID_ATTRIBUTE,
    versionIdAttribute: config.versionIdAttribute,
    envVar: config.envVar,
    mechanism: config.mechanism ?? LoadingMechanism.GUESS,
    logger: logger ?? createConsoleLogger("plugin-factory"),
    env: env ?? process.env,
  };
}
