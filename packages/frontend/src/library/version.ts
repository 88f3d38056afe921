/**
 * Library versions, used to gate generated code behind the release in which
 * an item first appeared.
 */

import { createDiagnostic, type Diagnostic } from "../types/diagnostic.js";
import { error, ok, type Result } from "../types/result.js";

export type Version = {
  readonly major: number;
  readonly minor: number;
  readonly patch: number;
};

const VERSION_PATTERN = /^(\d+)(?:\.(\d+))?(?:\.(\d+))?$/;

export const createVersion = (major: number, minor = 0, patch = 0): Version => ({
  major,
  minor,
  patch,
});

/**
 * Parse "3", "3.24" or "3.24.1"
 */
export const parseVersion = (text: string): Result<Version, Diagnostic> => {
  const match = VERSION_PATTERN.exec(text.trim());
  if (!match) {
    return error(
      createDiagnostic(
        "IGN3001",
        "error",
        `Malformed version '${text}'`,
        undefined,
        "Expected MAJOR, MAJOR.MINOR or MAJOR.MINOR.PATCH"
      )
    );
  }

  return ok(
    createVersion(
      Number(match[1]),
      Number(match[2] ?? "0"),
      Number(match[3] ?? "0")
    )
  );
};

export const compareVersions = (a: Version, b: Version): number =>
  a.major - b.major || a.minor - b.minor || a.patch - b.patch;

export const formatVersion = (version: Version): string =>
  `${version.major}.${version.minor}.${version.patch}`;

/**
 * Name of the build feature that enables items of this version, e.g. "v3_24"
 */
export const versionFeatureName = (version: Version): string =>
  version.patch > 0
    ? `v${version.major}_${version.minor}_${version.patch}`
    : `v${version.major}_${version.minor}`;
