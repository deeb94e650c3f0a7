/**
 * Source pattern matcher
 * Applies the pattern catalog to file contents
 */

import type { CallRule, Endpoint, EndpointRule, HttpMethod } from '../types.js';
import { CALL_RULES, ENDPOINT_RULES, ENDPOINT_SENTINEL_PATH } from '../catalog/patterns.js';

interface CompiledEndpointRule {
  method: HttpMethod;
  regex: RegExp;
}

/**
 * Compile catalog rules once. Endpoints are case-insensitive, calls are not.
 */
export function compileEndpointRules(rules: readonly EndpointRule[]): CompiledEndpointRule[] {
  return rules.map(rule => ({
    method: rule.method,
    regex: new RegExp(rule.pattern.source, 'gi'),
  }));
}

export function compileCallRules(rules: readonly CallRule[]): RegExp[] {
  return rules.map(rule => new RegExp(rule.pattern.source, 'g'));
}

const DEFAULT_ENDPOINT_RULES = compileEndpointRules(ENDPOINT_RULES);
const DEFAULT_CALL_RULES = compileCallRules(CALL_RULES);

/**
 * Collapse "users/", "/users" and "users" to "/users"
 */
export function normalizeEndpointPath(rawPath: string): string {
  return '/' + rawPath.replace(/^\/+|\/+$/g, '');
}

export function formatEndpoint(endpoint: Endpoint): string {
  return `${endpoint.method} ${endpoint.path}`;
}

/**
 * Find every endpoint declaration in a file's text
 */
export function matchEndpoints(
  content: string,
  rules: readonly CompiledEndpointRule[] = DEFAULT_ENDPOINT_RULES
): Endpoint[] {
  const endpoints: Endpoint[] = [];

  for (const rule of rules) {
    for (const match of content.matchAll(rule.regex)) {
      const captured = match[1];
      endpoints.push({
        method: rule.method,
        path: captured === undefined ? ENDPOINT_SENTINEL_PATH : normalizeEndpointPath(captured),
      });
    }
  }

  return endpoints;
}

/**
 * Find every outbound call site; the trimmed full match is the call's identity
 */
export function matchCalls(content: string, rules: readonly RegExp[] = DEFAULT_CALL_RULES): string[] {
  const calls: string[] = [];

  for (const regex of rules) {
    for (const match of content.matchAll(regex)) {
      const text = match[0].trim();
      if (text) calls.push(text);
    }
  }

  return calls;
}
