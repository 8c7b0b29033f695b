import { UsageError } from './errors.js';
import { capture } from './process.js';
import { NixEvalStringSchema, NixEnvListingSchema } from './schemas.js';
import type { Package } from './types.js';

/** An attribute name Nix accepts without quotes */
const IDENTIFIER_REGEX = /^[A-Za-z_][A-Za-z0-9_'-]*$/;

const NIX_KEYWORDS = new Set(['assert', 'else', 'if', 'in', 'inherit', 'let', 'or', 'rec', 'then', 'with']);

/**
 * Split an attribute path into its attribute names.
 *
 * Names that are not identifiers are double-quoted, the way nix-env prints
 * them: `nodePackages."@angular/cli"`. Inside quotes a backslash escapes the
 * next character. Returns null for a malformed path.
 */
export function parseAttrPath(attr: string): string[] | null {
  const names: string[] = [];
  let i = 0;

  for (;;) {
    let name = '';
    if (attr.charAt(i) === '"') {
      i++;
      while (i < attr.length && attr.charAt(i) !== '"') {
        if (attr.charAt(i) === '\\') i++;
        if (i >= attr.length) return null;
        name += attr.charAt(i);
        i++;
      }
      // unterminated or empty
      if (i >= attr.length || name === '') return null;
      i++;
    } else {
      const dot = attr.indexOf('.', i);
      const end = dot === -1 ? attr.length : dot;
      name = attr.slice(i, end);
      if (!IDENTIFIER_REGEX.test(name)) return null;
      i = end;
    }

    names.push(name);
    if (i === attr.length) return names;
    if (attr.charAt(i) !== '.') return null;
    i++;
  }
}

/**
 * Validate a package attribute path given on the command line.
 */
export function validateAttrPath(attr: string): void {
  if (parseAttrPath(attr) === null) {
    throw new UsageError(`'${attr}' is not a valid nixpkgs attribute path`);
  }
}

function renderAttrName(name: string): string {
  if (IDENTIFIER_REGEX.test(name) && !NIX_KEYWORDS.has(name)) return name;
  const escaped = name.replace(/[\\"]/g, (c) => `\\${c}`).replace(/\$\{/g, () => '\\${');
  return `"${escaped}"`;
}

/**
 * Render an attribute path for a Nix expression, quoting and escaping every
 * name that is not a plain identifier.
 */
export function nixAttrPath(attr: string): string {
  const names = parseAttrPath(attr);
  if (names === null) {
    throw new UsageError(`'${attr}' is not a valid nixpkgs attribute path`);
  }
  return names.map(renderAttrName).join('.');
}

/**
 * The Nix system double of this machine, e.g. `x86_64-linux` or `aarch64-darwin`,
 * as Nix itself reports it.
 */
export async function currentSystem(): Promise<string> {
  const stdout = await capture('nix-instantiate', ['--eval', '--json', '--expr', 'builtins.currentSystem']);
  return NixEvalStringSchema.parse(JSON.parse(stdout));
}

/**
 * List every package nixpkgs at `dir` exposes, with output paths.
 * NIXPKGS_CONFIG from the surrounding Buildenv applies.
 */
export async function listPackages(dir: string): Promise<Package[]> {
  const stdout = await capture('nix-env', ['-f', dir, '-qaP', '--json', '--out-path', '--show-trace']);
  const listing = NixEnvListingSchema.parse(JSON.parse(stdout));

  return Object.entries(listing).map(([attr, pkg]) => {
    const outputs: Record<string, string> = {};
    for (const [output, outPath] of Object.entries(pkg.outputs)) {
      if (outPath !== null) outputs[output] = outPath;
    }
    return { attr, name: pkg.name, outputs };
  });
}

function outputsKey(pkg: Package): string {
  return Object.keys(pkg.outputs)
    .sort()
    .map((output) => `${output}=${pkg.outputs[output]}`)
    .join(' ');
}

/**
 * Attributes that are new in `after` or whose output paths differ from `before`.
 * Removed packages are not included: there is nothing to build for them.
 */
export function differences(before: readonly Package[], after: readonly Package[]): Set<string> {
  const old = new Map(before.map((pkg) => [pkg.attr, outputsKey(pkg)]));
  const changed = new Set<string>();

  for (const pkg of after) {
    if (old.get(pkg.attr) !== outputsKey(pkg)) {
      changed.add(pkg.attr);
    }
  }

  return changed;
}

/**
 * Parse the gist ofborg attaches to its evaluation status.
 *
 * Each line reads `<system> <attr>`; only attrs for `system` are returned.
 * Blank or malformed lines are skipped.
 */
export function parseOfborgGist(text: string, system: string): Set<string> {
  const attrs = new Set<string>();

  for (const line of text.split('\n')) {
    const fields = line.trim().split(/\s+/);
    if (fields.length !== 2) continue;
    const [lineSystem, attr] = fields;
    if (lineSystem === system) attrs.add(attr);
  }

  return attrs;
}

/**
 * Apply the `-p/--package` filter: a non-empty filter replaces the
 * evaluated set, an empty one leaves it untouched.
 */
export function filterPackages(
  changed: ReadonlySet<string>,
  onlyPackages: ReadonlySet<string>,
): Set<string> {
  return new Set(onlyPackages.size > 0 ? onlyPackages : changed);
}
