/**
 * Maven POM reader
 * Dependency coordinates and declared submodules
 */

import { XMLParser } from 'fast-xml-parser';

const INHERITED_VERSION = '<inherited>';

const pomParser = new XMLParser({
  ignoreAttributes: true,
  removeNSPrefix: true,
  parseTagValue: false,
  trimValues: true,
  isArray: (tagName: string) => tagName === 'dependency' || tagName === 'module',
});

type XmlNode = Record<string, unknown>;

function isNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asList(value: unknown): unknown[] {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}

function textOf(value: unknown): string | undefined {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }
  if (typeof value === 'number') return String(value);
  return undefined;
}

/**
 * Parse and validate a POM document. Throws on malformed XML.
 */
export function parsePom(content: string): unknown {
  return pomParser.parse(content, true);
}

/**
 * Visit every child list stored under `container` at any depth, e.g. every
 * <dependency> under every <dependencies>
 */
function collectNested(root: unknown, container: string, item: string): unknown[] {
  const found: unknown[] = [];

  function visit(node: unknown): void {
    if (Array.isArray(node)) {
      node.forEach(visit);
      return;
    }
    if (!isNode(node)) return;

    for (const [key, value] of Object.entries(node)) {
      if (key === container && isNode(value)) {
        found.push(...asList(value[item]));
      }
      visit(value);
    }
  }

  visit(root);
  return found;
}

/**
 * Dependency coordinates, group:artifact:version. Entries with an unwanted
 * scope are dropped; a missing version becomes <inherited>.
 */
export function collectPomDependencies(document: unknown, unwantedScopes: readonly string[]): string[] {
  const coordinates: string[] = [];

  for (const dependency of collectNested(document, 'dependencies', 'dependency')) {
    if (!isNode(dependency)) continue;

    const scope = textOf(dependency.scope);
    if (scope !== undefined && unwantedScopes.includes(scope)) continue;

    const groupId = textOf(dependency.groupId);
    const artifactId = textOf(dependency.artifactId);
    if (groupId === undefined || artifactId === undefined) continue;

    const version = textOf(dependency.version) ?? INHERITED_VERSION;
    coordinates.push(`${groupId}:${artifactId}:${version}`);
  }

  return coordinates;
}

/**
 * Names listed under <modules>, including those declared in profiles
 */
export function collectPomModules(document: unknown): string[] {
  return collectNested(document, 'modules', 'module')
    .map(textOf)
    .filter((name): name is string => name !== undefined);
}
