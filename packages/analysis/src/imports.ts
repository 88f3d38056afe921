/**
 * Version-gated declarations required by generated code.
 *
 * Each entry is either unconditional or gated on "library version >= V".
 * The emitter chooses the guard syntax.
 */

import { compareVersions, type Version } from "@introgen/frontend";

export type ImportEntry = {
  readonly name: string;
  readonly version?: Version;
};

export class Imports {
  private readonly gates = new Map<string, Version | undefined>();

  /**
   * @param minCfgVersion - Oldest library version the bindings support.
   *   Gates at or below it are always satisfied and recorded as unconditional.
   */
  constructor(private readonly minCfgVersion?: Version) {}

  add(name: string): void {
    this.addWithVersion(name, undefined);
  }

  /**
   * Require `name` from `version` on. When `name` is already required, the
   * weaker gate wins: unconditional over any version, else the lower version.
   */
  addWithVersion(name: string, version: Version | undefined): void {
    const gate = this.normalizeGate(version);

    if (!this.gates.has(name)) {
      this.gates.set(name, gate);
      return;
    }

    const current = this.gates.get(name);
    if (current === undefined) {
      return;
    }
    if (gate === undefined || compareVersions(gate, current) < 0) {
      this.gates.set(name, gate);
    }
  }

  has(name: string): boolean {
    return this.gates.has(name);
  }

  /**
   * Entries sorted by name
   */
  entries(): readonly ImportEntry[] {
    return [...this.gates.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([name, version]) => (version ? { name, version } : { name }));
  }

  private normalizeGate(version: Version | undefined): Version | undefined {
    if (
      version &&
      this.minCfgVersion &&
      compareVersions(version, this.minCfgVersion) <= 0
    ) {
      return undefined;
    }
    return version;
  }
}
