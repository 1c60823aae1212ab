import { mkdirSync, writeFileSync } from "node:fs";
import { createRequire } from "node:module";
import { dirname, join } from "node:path";
import { type Mock, vi } from "vitest";
import type { PluginType } from "../types.js";

const requireFromTests = createRequire(import.meta.url);

/** File name of the shared base class module written by `writeToolBase`. */
export const TOOL_BASE_FILE = "tool-base.cjs";

export interface MockLogger {
  readonly debug: Mock;
  readonly info: Mock;
  readonly warn: Mock;
  readonly error: Mock;
}

/**
 * Logger whose methods are spies.
 */
export function createMockLogger(): MockLogger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

/**
 * Write a file (creating parent directories) and return its path.
 */
export function writeFixture(dir: string, relativePath: string, content: string): string {
  const filePath = join(dir, relativePath);
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, content, "utf-8");
  return filePath;
}

/**
 * Write the CommonJS module defining the `Tool` base class that fixture
 * plugins extend, and load it so tests hold the same class object the
 * plugins see.
 */
export function writeToolBase(dir: string): { path: string; Tool: PluginType<object> } {
  const path = writeFixture(
    dir,
    TOOL_BASE_FILE,
    `class Tool {}
module.exports = { Tool };
`,
  );
  const exports: unknown = requireFromTests(path);
  const tool: unknown =
    typeof exports === "object" && exports !== null ? Reflect.get(exports, "Tool") : undefined;
  if (!isClass(tool)) {
    throw new Error(`${path} does not export a Tool class`);
  }
  return { path, Tool: tool };
}

export interface ToolSourceOptions {
  /** Path of the base class module to require. */
  readonly basePath: string;
  readonly className: string;
  /** Static attributes written onto the class, as JavaScript literals. */
  readonly statics?: Readonly<Record<string, string>>;
}

/**
 * CommonJS source defining one subclass of `Tool` and exporting it.
 */
export function toolPluginSource(options: ToolSourceOptions): string {
  const statics = Object.entries(options.statics ?? {})
    .map(([key, value]) => `  static ${key} = ${value};`)
    .join("\n");
  return `const { Tool } = require(${JSON.stringify(options.basePath)});

class ${options.className} extends Tool {
${statics}
}

module.exports = { ${options.className} };
`;
}

/**
 * Write a fixture plugin file defining one `Tool` subclass.
 */
export function writeToolPlugin(
  dir: string,
  relativePath: string,
  options: ToolSourceOptions,
): string {
  return writeFixture(dir, relativePath, toolPluginSource(options));
}

function isClass(value: unknown): value is PluginType<object> {
  return typeof value === "function";
}
