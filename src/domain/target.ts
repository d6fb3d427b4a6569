/**
 * Build target model.
 *
 * A target is one row of the build matrix: an operating system, a CPU
 * architecture and the feature flags the artifact is compiled with.
 */

/** One row of the build matrix. Identity is the tuple value. */
export interface TargetSpec {
  readonly operatingSystem: string;
  readonly cpuArchitecture: string;
  /** Canonical feature set: unique flags in sorted order. */
  readonly featureSet: readonly string[];
}

/** A target row as written in configuration, before validation. */
export interface TargetDeclaration {
  operatingSystem?: unknown;
  cpuArchitecture?: unknown;
  featureSet?: unknown;
}

/**
 * Feature applicability rule.
 *
 * Targets matching every given selector may not enable the listed flags.
 * An omitted selector matches any value.
 */
export interface FeatureRule {
  operatingSystem?: string;
  cpuArchitecture?: string;
  disallow: string[];
  /** Why the flags are unavailable on this target. */
  reason?: string;
}

/** Declarative matrix consumed by the expander. */
export interface MatrixDeclaration {
  targets: TargetDeclaration[];
  featureRules?: FeatureRule[];
  /** Architectures to build container images for. */
  imageArchitectures?: string[];
}

/** Create a canonical target. */
export function createTarget(operatingSystem: string, cpuArchitecture: string, featureSet: readonly string[] = []): TargetSpec {
  return Object.freeze({
    operatingSystem,
    cpuArchitecture,
    featureSet: Object.freeze(canonicalFeatureSet(featureSet)),
  });
}

/** Deduplicate and sort feature flags. */
export function canonicalFeatureSet(flags: readonly string[]): string[] {
  return Array.from(new Set(flags)).sort();
}

/** Stable identity string for a target, e.g. "linux-x86_64+jemalloc". */
export function targetKey(target: TargetSpec): string {
  const base = `${target.operatingSystem}-${target.cpuArchitecture}`;
  return target.featureSet.length > 0 ? `${base}+${target.featureSet.join('+')}` : base;
}

/** Whether a rule applies to the given operating system and architecture. */
export function ruleMatches(rule: FeatureRule, operatingSystem: string, cpuArchitecture: string): boolean {
  if (rule.operatingSystem !== undefined && rule.operatingSystem !== operatingSystem) return false;
  if (rule.cpuArchitecture !== undefined && rule.cpuArchitecture !== cpuArchitecture) return false;
  return true;
}
