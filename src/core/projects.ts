import { minimatch } from "minimatch";

/**
 * Prefix bare project names with the default group: `repo-a` → `group/repo-a`.
 * Paths that already contain a `/` are kept as given.
 */
export function expandProjectPaths(projects: readonly string[], group?: string): string[] {
  const prefix = group?.trim().replace(/\/+$/, "");
  return projects.map((project) => (prefix && !project.includes("/") ? `${prefix}/${project}` : project));
}

/** Drop every path matched by one of the glob patterns, e.g. `group/legacy-*`. */
export function excludeProjectPaths(projects: readonly string[], patterns: readonly string[]): string[] {
  if (patterns.length === 0) return [...projects];
  return projects.filter((project) => !patterns.some((pattern) => minimatch(project, pattern)));
}
