/**
 * Pattern Catalog
 *
 * Declarative recognition rules for endpoints and outbound calls, plus the
 * file-name tables the extractor dispatches on. Adding a framework means
 * appending an entry here; the matching routine never changes.
 */

import type { CallRule, EndpointRule, ManifestKind } from '../types.js';

/**
 * Route declarations. Matched case-insensitively.
 */
export const ENDPOINT_RULES: readonly EndpointRule[] = [
  // Spring
  { method: 'GET', dialect: 'java', pattern: /@GetMapping\("([^"]+)"\)/ },
  { method: 'POST', dialect: 'java', pattern: /@PostMapping\("([^"]+)"\)/ },
  { method: 'PUT', dialect: 'java', pattern: /@PutMapping\("([^"]+)"\)/ },
  { method: 'DELETE', dialect: 'java', pattern: /@DeleteMapping\("([^"]+)"\)/ },
  { method: 'ANY', dialect: 'java', pattern: /@RequestMapping\("([^"]+)"\)/ },

  // JAX-RS
  { method: 'ANY', dialect: 'java', pattern: /@Path\("([^"]+)"\)/ },
  { method: 'DELETE', dialect: 'java', pattern: /@DELETE\b/ },

  // Express application
  { method: 'GET', dialect: 'javascript', pattern: /app\.get\(\s*["']([^"']+)["']/ },
  { method: 'POST', dialect: 'javascript', pattern: /app\.post\(\s*["']([^"']+)["']/ },
  { method: 'PUT', dialect: 'javascript', pattern: /app\.put\(\s*["']([^"']+)["']/ },
  { method: 'DELETE', dialect: 'javascript', pattern: /app\.delete\(\s*["']([^"']+)["']/ },

  // Express router
  { method: 'GET', dialect: 'javascript', pattern: /router\.get\(\s*["']([^"']+)["']/ },
  { method: 'POST', dialect: 'javascript', pattern: /router\.post\(\s*["']([^"']+)["']/ },
  { method: 'PUT', dialect: 'javascript', pattern: /router\.put\(\s*["']([^"']+)["']/ },
  { method: 'DELETE', dialect: 'javascript', pattern: /router\.delete\(\s*["']([^"']+)["']/ },

  // Flask blueprints and apps
  { method: 'ANY', dialect: 'python', pattern: /@\w+\.route\(\s*["']([^"']+)["']/ },

  // net/http
  { method: 'ANY', dialect: 'go', pattern: /HandleFunc\(\s*"([^"]+)"/ },

  // Laravel
  { method: 'GET', dialect: 'php', pattern: /Route::get\(\s*["']([^"']+)["']/ },
  { method: 'POST', dialect: 'php', pattern: /Route::post\(\s*["']([^"']+)["']/ },
  { method: 'PUT', dialect: 'php', pattern: /Route::put\(\s*["']([^"']+)["']/ },
  { method: 'DELETE', dialect: 'php', pattern: /Route::delete\(\s*["']([^"']+)["']/ },
];

/**
 * Outbound call sites. Matched case-sensitively, whole match kept.
 */
export const CALL_RULES: readonly CallRule[] = [
  { kind: 'http-client', dialect: 'javascript', pattern: /axios\.(get|post|put|delete|request|create)\(/ },
  { kind: 'http-client', dialect: 'javascript', pattern: /fetch\(/ },
  { kind: 'http-client', dialect: 'python', pattern: /requests\.(get|post|put|delete|head|options)\(/ },
  { kind: 'http-client', dialect: 'java', pattern: /RestTemplate\.(getForObject|getForEntity|postForObject|postForEntity|exchange)\(/ },
  { kind: 'http-client', dialect: 'java', pattern: /httpClient\.(send|execute)\(/ },
  { kind: 'http-client', dialect: 'java', pattern: /WebClient\..*?\.(get|post|put|delete)\(/ },
  { kind: 'rpc-stub', dialect: 'java', pattern: /Grpc.*stub/ },
  { kind: 'rpc-stub', dialect: 'java', pattern: /\.newBlockingStub\(/ },
  { kind: 'rpc-stub', dialect: 'python', pattern: /insecure_channel\(/ },
  { kind: 'http-client', dialect: 'go', pattern: /http\.Get\(/ },
  { kind: 'http-client', dialect: 'go', pattern: /http\.Post\(/ },
  { kind: 'process-tool', dialect: 'php', pattern: /curl_init\(/ },
  { kind: 'process-tool', dialect: 'php', pattern: /file_get_contents\(/ },
  { kind: 'process-tool', dialect: 'shell', pattern: /\bcurl\b/ },
  { kind: 'process-tool', dialect: 'shell', pattern: /\bwget\b/ },
  { kind: 'process-tool', dialect: 'shell', pattern: /Invoke-WebRequest/ },
  { kind: 'url', dialect: 'any', pattern: /https?:\/\/[^\s"']+/ },
  { kind: 'api-path', dialect: 'any', pattern: /["'`](\/api\/[^"']+)["'`]/ },
];

/**
 * Path recorded for a rule that marks an endpoint without capturing a route
 */
export const ENDPOINT_SENTINEL_PATH = '/*';

export const ENDPOINT_SOURCE_EXTENSIONS: readonly string[] = ['.py', '.js', '.ts', '.java', '.kt', '.php', '.go'];

export const CALL_SOURCE_EXTENSIONS: readonly string[] = ['.py', '.js', '.ts', '.java', '.kt'];

export const MANIFEST_FILES: readonly ManifestKind[] = [
  'pom.xml',
  'package.json',
  'requirements.txt',
  'setup.py',
  'build.gradle',
  'go.mod',
  'composer.json',
];

// Front-end, vendor and test trees add noise to a backend signal
export const EXCLUDED_DIR_TOKENS: readonly string[] = [
  'node_modules',
  'frontend',
  'client',
  'web',
  'ui',
  'dist',
  'build',
  '__mocks__',
  'test',
  '.git',
];

export const UNWANTED_MAVEN_SCOPES: readonly string[] = ['test', 'provided', 'system', 'import'];

export const PRIMARY_BRANCH_CANDIDATES: readonly string[] = ['main', 'master', 'develop'];

export function isManifestFile(fileName: string): fileName is ManifestKind {
  return MANIFEST_FILES.some(name => name === fileName);
}
