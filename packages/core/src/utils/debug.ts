/**
 * Logs under a namespace when `DEBUG` enables it.
 *
 * `DEBUG` takes a comma or space separated list of namespaces; `prefix:*`
 * enables every namespace under `prefix`, and `*` enables all of them.
 */
export function dlog(ns: string, ...args: unknown[]) {
  const dbg = process.env.DEBUG;
  if (!dbg) return;
  const tokens = dbg.split(/[\s,]+/).filter(Boolean);
  if (tokens.some((token) => matches(token, ns))) {
    console.log(`[${ns}]`, ...args);
  }
}

function matches(token: string, ns: string): boolean {
  if (token === '*' || token === ns) return true;
  return token.endsWith(':*') && ns.startsWith(token.slice(0, -1));
}
