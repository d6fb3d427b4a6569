/**
 * Command templates.
 *
 * Configured commands refer to job parameters through `{name}`
 * placeholders, e.g. `--target {target} -F {features}`.
 */

import path from 'path';
import { TargetSpec } from '../domain/target';
import { CommandSpec } from './command-runner';

/** A command as declared in configuration. */
export interface CommandTemplate {
  name: string;
  command: string;
  args?: string[];
  /** Relative to the workspace root. */
  cwd?: string;
  env?: Record<string, string>;
}

export type TemplateVars = Record<string, string>;

const PLACEHOLDER = /\{([a-zA-Z][a-zA-Z0-9_]*)\}/g;

/** Replace known placeholders; unknown ones are left as written. */
export function renderTemplate(template: string, vars: TemplateVars): string {
  return template.replace(PLACEHOLDER, (match, name: string) =>
    Object.prototype.hasOwnProperty.call(vars, name) ? vars[name] : match,
  );
}

/** Render a command template against the workspace root and variables. */
export function renderCommand(template: CommandTemplate, vars: TemplateVars, workspaceRoot: string): CommandSpec {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(template.env ?? {})) {
    env[key] = renderTemplate(value, vars);
  }
  const cwd = template.cwd ? renderTemplate(template.cwd, vars) : undefined;
  return {
    name: template.name,
    command: renderTemplate(template.command, vars),
    args: (template.args ?? []).map((arg) => renderTemplate(arg, vars)),
    cwd: cwd ? path.resolve(workspaceRoot, cwd) : workspaceRoot,
    env,
  };
}

/** Template variables describing a target. */
export function targetVars(target: TargetSpec | null, toolchainTarget?: string): TemplateVars {
  if (!target) return {};
  return {
    os: target.operatingSystem,
    arch: target.cpuArchitecture,
    features: target.featureSet.length > 0 ? target.featureSet.join(',') : 'default',
    target: toolchainTarget ?? `${target.cpuArchitecture}-${target.operatingSystem}`,
  };
}
