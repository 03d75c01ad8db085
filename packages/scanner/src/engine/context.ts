const COMMENT_PREFIXES = ["#", "//", "/*", "*", "--", "<!--", '"""', "'''"];

// def foo(, async def foo(, function foo(, foo(a, b) {, const foo = (...) => {
const FUNCTION_HEADER =
  /^\s*(?:async\s+)?def\s+\w+\s*\(|\bfunction\b\s*\*?\s*\w*\s*\(|^\s*(?:(?:public|private|protected|static|async|export|default)\s+)*(?!(?:if|for|while|switch|catch|with|return)\b)\w+\s*\([^)]*\)\s*(?::\s*[\w<>[\],.| ]+)?\s*\{\s*$|=>\s*\{?\s*$/;

const FUNCTION_NAME = /\b(?:def|function)\s+(\w+)|\b(\w+)\s*[=:]\s*(?:async\s*)?(?:function\b|\()|^\s*(?:(?:public|private|protected|static|async)\s+)*(\w+)\s*\(/;

const HANDLER_NAME =
  /^(?:handle|on_|api_|route|view|get_|post_|put_|patch_|delete_)|^on[A-Z]|(?:_handler|Handler|_view|_endpoint|Endpoint|_tool)$|^(?:handler|lambda_handler|main)$/;

const ROUTE_DECORATOR = /^\s*@[\w.]*(?:route|get|post|put|patch|delete|tool|resource|api_view)\b/;

const DIFFERENTIATED_HANDLER =
  /^\s*except\s+\(?\s*(?!(?:Base)?Exception\b)[A-Za-z_][\w.]*|\binstanceof\s+\w+/;

const PLACEHOLDER =
  /^(?:|changeme|change_me|example|placeholder|dummy|todo|x{3,}|\*+|<[^>]*>|\$\{[^}]*\}|\{\{[^}]*\}\}|your[-_ ].*)$/i;

const ASSIGNED_LITERAL = /[:=]\s*(?:[rbuf]{1,2})?(['"`])(.*?)\1/gi;

const TEST_FILE_NAME = /^test_|_test\.\w+$|\.(?:test|spec)\.\w+$|^conftest\.py$/i;

export function isCommentLine(line: string): boolean {
  const trimmed = line.trimStart();
  return COMMENT_PREFIXES.some((prefix) => trimmed.startsWith(prefix));
}

function pathSegments(unitId: string): { dirs: string[]; file: string } {
  const parts = unitId.split(/[\\/]+/).filter((p) => p.length > 0);
  const file = parts.pop() ?? "";
  return { dirs: parts.map((p) => p.toLowerCase()), file };
}

export function hasFixtureSegment(unitId: string, fixtureSegments: readonly string[]): boolean {
  const { dirs } = pathSegments(unitId);
  return dirs.some((dir) => fixtureSegments.includes(dir));
}

export function isTestPath(unitId: string, testSegments: readonly string[]): boolean {
  const { dirs, file } = pathSegments(unitId);
  return dirs.some((dir) => testSegments.includes(dir)) || TEST_FILE_NAME.test(file);
}

/**
 * True when every string literal assigned on this line is a placeholder such
 * as "changeme" or "<token>". A line with no assigned literal is not one.
 */
export function assignsPlaceholder(line: string): boolean {
  const literals = [...line.matchAll(ASSIGNED_LITERAL)].map((m) => m[2].trim());
  return literals.length > 0 && literals.every((value) => PLACEHOLDER.test(value));
}

/**
 * Index of the nearest function-like header at or above `index`, looking back
 * at most `window` lines. Returns -1 when none is found.
 */
export function findBlockHeader(lines: readonly string[], index: number, window: number): number {
  const stop = Math.max(0, index - window);
  for (let i = index; i >= stop; i--) {
    if (FUNCTION_HEADER.test(lines[i])) return i;
  }
  return -1;
}

export function hasDifferentiatedHandler(
  lines: readonly string[],
  index: number,
  window: number,
): boolean {
  const start = Math.max(0, index - window);
  const end = Math.min(lines.length - 1, index + window);
  for (let i = start; i <= end; i++) {
    if (DIFFERENTIATED_HANDLER.test(lines[i])) return true;
  }
  return false;
}

export function functionName(header: string): string | null {
  const m = header.match(FUNCTION_NAME);
  if (!m) return null;
  return m[1] ?? m[2] ?? m[3] ?? null;
}

/**
 * Whether the line sits in a publicly reachable function: a handler-style name,
 * an `export`ed function, or one carrying a route/tool decorator.
 */
export function isEntryPoint(lines: readonly string[], index: number, window: number): boolean {
  const header = findBlockHeader(lines, index, window);
  if (header === -1) return false;

  const headerLine = lines[header];
  if (/^\s*export\b/.test(headerLine)) return true;

  const name = functionName(headerLine);
  if (name && HANDLER_NAME.test(name)) return true;

  for (let i = header - 1; i >= Math.max(0, header - 3); i--) {
    if (ROUTE_DECORATOR.test(lines[i])) return true;
    if (!/^\s*@/.test(lines[i])) break;
  }
  return false;
}
