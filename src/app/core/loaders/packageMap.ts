import path from "node:path";

export type ResolvedResource = { ok: true; path: string } | { ok: false; reason: string };

const SCHEME_RE = /^([a-z][a-z0-9+.-]*):\/\//i;
const FIND_RE = /^\$\(\s*find\s+([^)\s]+)\s*\)\/?/i;

/** Package name -> root directory, for `package://` and `model://` URIs. */
export class PackageMap {
  private packages = new Map<string, string>();

  static fromEntries(entries: Record<string, string>) {
    const map = new PackageMap();
    for (const [name, dir] of Object.entries(entries)) {
      map.add(name, dir);
    }
    return map;
  }

  add(name: string, dir: string) {
    const resolved = path.resolve(dir);
    const existing = this.packages.get(name);
    if (existing !== undefined && existing !== resolved) {
      throw new Error(`Package '${name}' is already registered at '${existing}'; refusing to remap it to '${resolved}'.`);
    }
    this.packages.set(name, resolved);
  }

  getPath(name: string): string | null {
    return this.packages.get(name) ?? null;
  }

  packageNames() {
    return Array.from(this.packages.keys()).sort();
  }

  get size() {
    return this.packages.size;
  }
}

function resolveInPackage(packageMap: PackageMap, rest: string, uri: string): ResolvedResource {
  const slash = rest.indexOf("/");
  const packageName = slash >= 0 ? rest.slice(0, slash) : rest;
  const relative = slash >= 0 ? rest.slice(slash + 1) : "";
  if (!packageName) return { ok: false, reason: `'${uri}' does not name a package` };
  const root = packageMap.getPath(packageName);
  if (root === null) return { ok: false, reason: `package '${packageName}' is not in the package map` };
  return { ok: true, path: path.join(root, relative) };
}

/**
 * Turns a resource reference into a filesystem path.
 * - `package://pkg/rel`, `model://pkg/rel` and `$(find pkg)/rel` go through the package map
 * - `file:///abs` and absolute paths are used as given
 * - anything else is relative to `rootDir`
 */
export function resolveResourceUri(uri: string, packageMap: PackageMap, rootDir: string): ResolvedResource {
  const trimmed = uri.trim();
  if (!trimmed) return { ok: false, reason: "empty resource reference" };

  const find = FIND_RE.exec(trimmed);
  if (find) return resolveInPackage(packageMap, `${find[1]}/${trimmed.slice(find[0].length)}`, uri);

  const scheme = SCHEME_RE.exec(trimmed)?.[1]?.toLowerCase();
  if (scheme) {
    const rest = trimmed.slice(scheme.length + 3);
    if (scheme === "package" || scheme === "model") return resolveInPackage(packageMap, rest, uri);
    if (scheme === "file") return { ok: true, path: path.normalize(rest.startsWith("/") ? rest : `/${rest}`) };
    return { ok: false, reason: `unsupported URI scheme '${scheme}://'` };
  }

  if (path.isAbsolute(trimmed)) return { ok: true, path: path.normalize(trimmed) };
  return { ok: true, path: path.resolve(rootDir, trimmed) };
}
