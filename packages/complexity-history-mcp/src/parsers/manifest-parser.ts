/**
 * Dependency manifest parsers
 * One parser per manifest format, dispatched by file name
 */

import { z } from 'zod';
import type { ManifestKind } from '../types.js';
import { collectPomDependencies, parsePom } from './maven-pom.js';

const packageJsonSchema = z.object({
  dependencies: z.record(z.unknown()).optional(),
});

const composerJsonSchema = z.object({
  require: z.record(z.unknown()).optional(),
});

const GRADLE_DEPENDENCY = /(?:implementation|api|compile)\s+["']([^"']+)["']/g;
// Quoted entries may themselves contain brackets, e.g. "pydantic[email]"
const SETUP_INSTALL_REQUIRES = /install_requires\s*=\s*\[((?:[^\]"']|"[^"]*"|'[^']*')*)\]/g;
const QUOTED_STRING = /["']([^"']+)["']/g;
const REQUIREMENT_NAME_END = /[\s<>=!~;[]/;

export function parsePackageJson(content: string): string[] {
  const manifest = packageJsonSchema.parse(JSON.parse(content));
  return Object.keys(manifest.dependencies ?? {});
}

/**
 * Composer "require" keys; platform requirements such as php or ext-json
 * carry no vendor prefix and are not packages
 */
export function parseComposerJson(content: string): string[] {
  const manifest = composerJsonSchema.parse(JSON.parse(content));
  return Object.keys(manifest.require ?? {}).filter(name => name.includes('/'));
}

export function parseRequirementsTxt(content: string): string[] {
  const names: string[] = [];

  for (const rawLine of content.split('\n')) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) continue;
    const name = line.split('==')[0]?.trim();
    if (name) names.push(name);
  }

  return names;
}

export function parseSetupPy(content: string): string[] {
  const names: string[] = [];

  for (const block of content.matchAll(SETUP_INSTALL_REQUIRES)) {
    for (const requirement of (block[1] ?? '').matchAll(QUOTED_STRING)) {
      const name = (requirement[1] ?? '').split(REQUIREMENT_NAME_END)[0]?.trim();
      if (name) names.push(name);
    }
  }

  return names;
}

export function parseBuildGradle(content: string): string[] {
  return Array.from(content.matchAll(GRADLE_DEPENDENCY), match => match[1] ?? '').filter(Boolean);
}

/**
 * Module paths from single-line requires and from require ( ... ) blocks
 */
export function parseGoMod(content: string): string[] {
  const modules: string[] = [];
  let inBlock = false;

  for (const rawLine of content.split('\n')) {
    const line = rawLine.trim();

    if (inBlock) {
      if (line.startsWith(')')) {
        inBlock = false;
        continue;
      }
      const token = line.split(/\s+/)[0];
      if (token && !token.startsWith('//')) modules.push(token);
      continue;
    }

    if (!line.startsWith('require')) continue;

    const parts = line.split(/\s+/);
    if (parts[1] === '(') {
      inBlock = true;
    } else if (parts[1]) {
      modules.push(parts[1]);
    }
  }

  return modules;
}

/**
 * Parse one manifest. Throws on malformed content; the caller turns that
 * into an empty contribution.
 */
export function parseManifest(
  kind: ManifestKind,
  content: string,
  unwantedScopes: readonly string[]
): string[] {
  switch (kind) {
    case 'pom.xml':
      return collectPomDependencies(parsePom(content), unwantedScopes);
    case 'package.json':
      return parsePackageJson(content);
    case 'composer.json':
      return parseComposerJson(content);
    case 'requirements.txt':
      return parseRequirementsTxt(content);
    case 'setup.py':
      return parseSetupPy(content);
    case 'build.gradle':
      return parseBuildGradle(content);
    case 'go.mod':
      return parseGoMod(content);
  }
}
