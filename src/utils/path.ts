import path from 'node:path';

export const TEMPLATE_EXTENSION = '.hbs';

export function isTemplatePath(p: string): boolean {
  const base = path.basename(p);
  return base.endsWith(TEMPLATE_EXTENSION) && base.length > TEMPLATE_EXTENSION.length;
}

// `foo.conf.hbs` => `foo.conf`
export function stripTemplateExtension(p: string): string {
  return isTemplatePath(p) ? p.slice(0, -TEMPLATE_EXTENSION.length) : p;
}

/**
 * Compute what a symlink at `linkPath` should point to so that it reaches
 * `buildPath`.
 *
 * An absolute build path is used as-is. Otherwise the target is relative to
 * the directory holding the link, counted by real directory depth after both
 * paths are resolved against the working directory, so `..` segments in the
 * build path and absolute link roots come out right.
 */
export function resolveLinkTarget(
  linkPath: string,
  buildPath: string,
  cwd: string = process.cwd(),
): string {
  if (path.isAbsolute(buildPath)) return buildPath;
  const linkDir = path.dirname(path.resolve(cwd, linkPath));
  const target = path.relative(linkDir, path.resolve(cwd, buildPath));
  return target === '' ? '.' : target;
}
