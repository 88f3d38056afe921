/**
 * Configuration loading and validation
 */

import { readFileSync, existsSync } from "node:fs";
import { basename, dirname, join, resolve } from "node:path";
import {
  createDiagnostic,
  isRecord,
  parseVersion,
  type Diagnostic,
  type Result,
  type Version,
} from "@introgen/frontend";
import {
  OPERATION_KINDS,
  type OperationKind,
  type TypePolicy,
} from "@introgen/analysis";
import { identMatches, parseIdent } from "./ident.js";
import type {
  CliOptions,
  IntrogenConfig,
  IntrogenObjectConfig,
  ObjectPolicy,
  ResolvedConfig,
} from "./types.js";

export const CONFIG_FILE_NAME = "introgen.json";

/**
 * Load introgen.json
 */
export const loadConfig = (
  configPath: string
): Result<IntrogenConfig, Diagnostic[]> => {
  if (!existsSync(configPath)) {
    return {
      ok: false,
      error: [
        createDiagnostic(
          "IGN1001",
          "error",
          `Config file not found: ${configPath}`
        ),
      ],
    };
  }

  let content: string;
  try {
    content = readFileSync(configPath, "utf-8");
  } catch (err) {
    return {
      ok: false,
      error: [
        createDiagnostic(
          "IGN1002",
          "error",
          `Failed to read config file: ${err instanceof Error ? err.message : String(err)}`,
          configPath
        ),
      ],
    };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    return {
      ok: false,
      error: [
        createDiagnostic(
          "IGN1003",
          "error",
          `Failed to parse ${basename(configPath)}: ${err instanceof Error ? err.message : String(err)}`,
          configPath
        ),
      ],
    };
  }

  return validateConfig(parsed, basename(configPath));
};

/**
 * Check the shape of parsed introgen.json
 */
export const validateConfig = (
  data: unknown,
  fileName: string
): Result<IntrogenConfig, Diagnostic[]> => {
  if (!isRecord(data)) {
    return {
      ok: false,
      error: [
        createDiagnostic(
          "IGN1004",
          "error",
          `${fileName} must contain an object`,
          fileName
        ),
      ],
    };
  }

  const diagnostics: Diagnostic[] = [];
  const invalid = (message: string): void => {
    diagnostics.push(createDiagnostic("IGN1005", "error", message, fileName));
  };

  const optionalString = (value: unknown, label: string): string | undefined => {
    if (value === undefined || typeof value === "string") return value;
    invalid(`'${label}' must be a string`);
    return undefined;
  };
  const optionalBoolean = (
    value: unknown,
    label: string
  ): boolean | undefined => {
    if (value === undefined || typeof value === "boolean") return value;
    invalid(`'${label}' must be a boolean`);
    return undefined;
  };

  let options: IntrogenConfig["options"];
  if (data.options !== undefined) {
    const raw = data.options;
    if (isRecord(raw)) {
      options = {
        library: optionalString(raw.library, "options.library"),
        version: optionalString(raw.version, "options.version"),
        minCfgVersion: optionalString(
          raw.minCfgVersion,
          "options.minCfgVersion"
        ),
        trustReturnValueNullability: optionalBoolean(
          raw.trustReturnValueNullability,
          "options.trustReturnValueNullability"
        ),
      };
    } else {
      invalid("'options' must be an object");
    }
  }

  const objects: IntrogenObjectConfig[] = [];
  if (data.objects !== undefined) {
    const raw = data.objects;
    if (Array.isArray(raw)) {
      raw.forEach((entry: unknown, index: number) => {
        if (!isRecord(entry)) {
          invalid(`'objects[${index}]' must be an object`);
          return;
        }

        let unhide: string[] | undefined;
        if (entry.unhide !== undefined) {
          const list: unknown = entry.unhide;
          if (
            Array.isArray(list) &&
            list.every((item): item is string => typeof item === "string")
          ) {
            unhide = list;
          } else {
            invalid(`'objects[${index}].unhide' must be an array of strings`);
          }
        }

        objects.push({
          name: optionalString(entry.name, `objects[${index}].name`),
          pattern: optionalString(entry.pattern, `objects[${index}].pattern`),
          trustReturnValueNullability: optionalBoolean(
            entry.trustReturnValueNullability,
            `objects[${index}].trustReturnValueNullability`
          ),
          unhide,
        });
      });
    } else {
      invalid("'objects' must be an array");
    }
  }

  if (diagnostics.length > 0) {
    return { ok: false, error: diagnostics };
  }

  return { ok: true, value: { options, objects } };
};

/**
 * Find introgen.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
};

const isOperationKind = (value: string): value is OperationKind =>
  OPERATION_KINDS.some((kind) => kind === value);

const resolveObject = (
  entry: IntrogenObjectConfig,
  index: number,
  fileName: string | undefined,
  diagnostics: Diagnostic[]
): ObjectPolicy | undefined => {
  const ident = parseIdent(entry, index, fileName);
  if (!ident.ok) {
    diagnostics.push(ident.error);
    return undefined;
  }

  const unhide: OperationKind[] = [];
  for (const name of entry.unhide ?? []) {
    if (isOperationKind(name)) {
      unhide.push(name);
    } else {
      diagnostics.push(
        createDiagnostic(
          "IGN1009",
          "error",
          `Unknown operation '${name}' in 'unhide' of object ${index}`,
          fileName,
          `Expected one of ${OPERATION_KINDS.join(", ")}`
        )
      );
    }
  }

  return {
    ident: ident.value,
    trustReturnValueNullability: entry.trustReturnValueNullability,
    unhide,
  };
};

/**
 * Resolve final configuration from file + CLI args
 */
export const resolveConfig = (
  config: IntrogenConfig,
  cliOptions: CliOptions,
  fileName?: string
): Result<ResolvedConfig, Diagnostic[]> => {
  const diagnostics: Diagnostic[] = [];

  let minCfgVersion: Version | undefined;
  const minCfgText = cliOptions.minCfgVersion ?? config.options?.minCfgVersion;
  if (minCfgText !== undefined) {
    const parsed = parseVersion(minCfgText);
    if (parsed.ok) {
      minCfgVersion = parsed.value;
    } else {
      diagnostics.push(parsed.error);
    }
  }

  const objects: ObjectPolicy[] = [];
  (config.objects ?? []).forEach((entry, index) => {
    const policy = resolveObject(entry, index, fileName, diagnostics);
    if (policy) {
      objects.push(policy);
    }
  });

  if (diagnostics.length > 0) {
    return { ok: false, error: diagnostics };
  }

  return {
    ok: true,
    value: {
      library: config.options?.library,
      libraryVersion: config.options?.version,
      minCfgVersion,
      trustReturnValueNullability:
        cliOptions.trustNullability ??
        config.options?.trustReturnValueNullability ??
        false,
      objects,
      verbose: cliOptions.verbose ?? false,
      quiet: cliOptions.quiet ?? false,
      json: cliOptions.json ?? false,
    },
  };
};

/**
 * First object entry matching `typeName`, if any
 */
export const findObjectPolicy = (
  config: ResolvedConfig,
  typeName: string
): ObjectPolicy | undefined =>
  config.objects.find((entry) => identMatches(entry.ident, typeName));

/**
 * Analysis policy for one type: global options overridden by the first
 * matching object entry.
 */
export const policyForType = (
  config: ResolvedConfig,
  typeName: string
): TypePolicy => {
  const entry = findObjectPolicy(config, typeName);
  return {
    trustReturnValueNullability:
      entry?.trustReturnValueNullability ?? config.trustReturnValueNullability,
    unhide: entry?.unhide ?? [],
    minCfgVersion: config.minCfgVersion,
  };
};
