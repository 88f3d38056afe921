/**
 * Type model loader - reads a pre-built library model from JSON and validates
 * it into function descriptors.
 *
 * File shape:
 * {
 *   "types": [
 *     {
 *       "name": "Gdk.Rgba",
 *       "kind": "other",
 *       "functions": [
 *         {
 *           "cName": "gdk_rgba_to_string",
 *           "name": "to_string",
 *           "parameters": [{ "name": "rgba", "type": "Gdk.Rgba", "instance": true }],
 *           "returns": { "type": "utf8", "nullable": false, "transfer": "full" },
 *           "version": "3.0"
 *         }
 *       ]
 *     }
 *   ]
 * }
 *
 * `visibility` defaults to "public", `generate` to true.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import type { Diagnostic } from "../types/diagnostic.js";
import { createDiagnostic } from "../types/diagnostic.js";
import type { Result } from "../types/result.js";
import type {
  FunctionInfo,
  LibraryType,
  LibraryTypeKind,
  ParameterInfo,
  ReturnInfo,
  Transfer,
  Visibility,
} from "./types.js";
import { parseVersion, type Version } from "./version.js";

const TYPE_KINDS: readonly LibraryTypeKind[] = [
  "enumeration",
  "bitfield",
  "other",
];
const TRANSFERS: readonly Transfer[] = ["none", "full", "container"];
const VISIBILITIES: readonly Visibility[] = [
  "public",
  "private",
  "hidden",
  "suppressed",
];

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const oneOf = <T extends string>(
  value: unknown,
  allowed: readonly T[]
): T | undefined => allowed.find((candidate) => candidate === value);

/**
 * Load and validate a type model file.
 */
export const loadTypeModel = (
  filePath: string
): Result<LibraryType[], Diagnostic[]> => {
  if (!fs.existsSync(filePath)) {
    return {
      ok: false,
      error: [
        createDiagnostic(
          "IGN2001",
          "error",
          `Model file not found: ${filePath}`
        ),
      ],
    };
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    return {
      ok: false,
      error: [
        createDiagnostic(
          "IGN2002",
          "error",
          `Failed to read model file: ${err instanceof Error ? err.message : String(err)}`,
          filePath
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
          "IGN2003",
          "error",
          `Invalid JSON in model file: ${err instanceof Error ? err.message : String(err)}`,
          filePath
        ),
      ],
    };
  }

  return validateTypeModel(parsed, path.basename(filePath));
};

/**
 * Validate parsed JSON into library types.
 *
 * All problems are collected; nothing is returned unless every entry is valid.
 */
export const validateTypeModel = (
  data: unknown,
  fileName: string
): Result<LibraryType[], Diagnostic[]> => {
  if (!isRecord(data) || !Array.isArray(data.types)) {
    return {
      ok: false,
      error: [
        createDiagnostic(
          "IGN2004",
          "error",
          "Model must be an object with a 'types' array",
          fileName
        ),
      ],
    };
  }

  const diagnostics: Diagnostic[] = [];
  const types: LibraryType[] = [];

  data.types.forEach((entry: unknown, index: number) => {
    const type = validateType(entry, index, fileName, diagnostics);
    if (type) {
      types.push(type);
    }
  });

  if (diagnostics.length > 0) {
    return { ok: false, error: diagnostics };
  }

  return { ok: true, value: types };
};

const validateType = (
  data: unknown,
  index: number,
  fileName: string,
  diagnostics: Diagnostic[]
): LibraryType | undefined => {
  const context = `type ${index}`;

  if (!isRecord(data)) {
    diagnostics.push(
      createDiagnostic(
        "IGN2005",
        "error",
        `Invalid ${context}: must be an object`,
        fileName
      )
    );
    return undefined;
  }

  const name = typeof data.name === "string" ? data.name : undefined;
  const kind = oneOf(data.kind ?? "other", TYPE_KINDS);
  const before = diagnostics.length;

  if (name === undefined) {
    diagnostics.push(
      createDiagnostic(
        "IGN2005",
        "error",
        `Invalid ${context}: missing or invalid 'name'`,
        fileName
      )
    );
  }
  if (kind === undefined) {
    diagnostics.push(
      createDiagnostic(
        "IGN2005",
        "error",
        `Invalid ${context}: 'kind' must be one of ${TYPE_KINDS.join(", ")}`,
        fileName
      )
    );
  }

  const rawFunctions = data.functions ?? [];
  if (!Array.isArray(rawFunctions)) {
    diagnostics.push(
      createDiagnostic(
        "IGN2005",
        "error",
        `Invalid ${context}: 'functions' must be an array if present`,
        fileName
      )
    );
    return undefined;
  }

  const functions: FunctionInfo[] = [];
  rawFunctions.forEach((entry: unknown, position: number) => {
    const func = validateFunction(
      entry,
      `function ${position} of ${name ?? context}`,
      fileName,
      diagnostics
    );
    if (func) {
      functions.push(func);
    }
  });

  if (name === undefined || kind === undefined || diagnostics.length > before) {
    return undefined;
  }

  return { name, kind, functions };
};

const validateFunction = (
  data: unknown,
  context: string,
  fileName: string,
  diagnostics: Diagnostic[]
): FunctionInfo | undefined => {
  const fail = (reason: string): undefined => {
    diagnostics.push(
      createDiagnostic("IGN2006", "error", `Invalid ${context}: ${reason}`, fileName)
    );
    return undefined;
  };

  if (!isRecord(data)) {
    return fail("must be an object");
  }
  if (typeof data.cName !== "string" || typeof data.name !== "string") {
    return fail("'cName' and 'name' must be strings");
  }

  const visibility = oneOf(data.visibility ?? "public", VISIBILITIES);
  if (visibility === undefined) {
    return fail(`'visibility' must be one of ${VISIBILITIES.join(", ")}`);
  }

  const generate = data.generate ?? true;
  if (typeof generate !== "boolean") {
    return fail("'generate' must be a boolean");
  }

  const rawParameters = data.parameters ?? [];
  if (!Array.isArray(rawParameters)) {
    return fail("'parameters' must be an array if present");
  }
  const parameters: ParameterInfo[] = [];
  for (const parameter of rawParameters) {
    if (
      !isRecord(parameter) ||
      typeof parameter.name !== "string" ||
      typeof parameter.type !== "string"
    ) {
      return fail("each parameter needs string 'name' and 'type'");
    }
    parameters.push({
      name: parameter.name,
      typeName: parameter.type,
      instanceParameter: parameter.instance === true,
    });
  }

  let ret: ReturnInfo | undefined;
  if (data.returns !== undefined) {
    const returns = data.returns;
    if (!isRecord(returns) || typeof returns.type !== "string") {
      return fail("'returns' must be an object with a string 'type'");
    }
    const transfer = oneOf(returns.transfer ?? "none", TRANSFERS);
    if (transfer === undefined) {
      return fail(`'transfer' must be one of ${TRANSFERS.join(", ")}`);
    }
    ret = {
      typeName: returns.type,
      nullable: returns.nullable === true,
      transfer,
    };
  }

  let version: Version | undefined;
  if (data.version !== undefined) {
    if (typeof data.version !== "string") {
      return fail("'version' must be a string");
    }
    const parsed = parseVersion(data.version);
    if (!parsed.ok) {
      return fail(parsed.error.message);
    }
    version = parsed.value;
  }

  return {
    rawName: data.cName,
    name: data.name,
    parameters,
    ret,
    visibility,
    version,
    generate,
  };
};
