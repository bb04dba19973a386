/**
 * Path Mapper — rewrites slide and thumbnail locations.
 *
 * Three mutually exclusive rule forms:
 *   "<>" or blank     identity, paths are left untouched
 *   "old:new"         swap a leading prefix (split on the first ":")
 *   "/mount/point/"   prepend a directory; absolute sources lose their root
 */

import path from "path";
import type { Logger } from "../shared/logger.js";
import { silentLogger } from "../shared/logger.js";
import { isBlank } from "../tables/csv_table.js";
import type { Table } from "../tables/csv_table.js";

export const IDENTITY_MARKER = "<>";

export type PathRule =
  | { kind: "identity" }
  | { kind: "prefix"; oldPrefix: string; newPrefix: string }
  | { kind: "mount"; mountPoint: string };

export function parsePathRule(rule: string): PathRule {
  const trimmed = rule.trim();
  if (trimmed === "" || trimmed === IDENTITY_MARKER) return { kind: "identity" };

  const sep = rule.indexOf(":");
  if (sep >= 0) {
    return {
      kind: "prefix",
      oldPrefix: rule.slice(0, sep),
      newPrefix: rule.slice(sep + 1),
    };
  }
  return { kind: "mount", mountPoint: rule };
}

/**
 * Lexical normalization: collapses repeated separators and "." segments and
 * drops any trailing separator. ".." segments are kept as written.
 */
export function normalizePath(p: string): string {
  if (p === "") return p;
  const absolute = p.startsWith("/");
  const parts = p.split("/").filter((seg) => seg !== "" && seg !== ".");
  const joined = parts.join("/");
  if (absolute) return `/${joined}`;
  return joined === "" ? "." : joined;
}

export function transformPath(
  knownPath: string,
  rule: PathRule,
  logger: Logger = silentLogger,
): string {
  switch (rule.kind) {
    case "identity":
      return knownPath;

    case "prefix": {
      const current = normalizePath(knownPath);
      if (!current.startsWith(rule.oldPrefix)) {
        logger.warn(`Prefix '${rule.oldPrefix}' not found in '${knownPath}'`);
        return knownPath;
      }
      return normalizePath(rule.newPrefix + current.slice(rule.oldPrefix.length));
    }

    case "mount": {
      const relative = path.posix.isAbsolute(knownPath)
        ? knownPath.replace(/^\/+/, "")
        : knownPath;
      return normalizePath(`${rule.mountPoint}/${relative}`);
    }
  }
}

/**
 * Apply a rule to every row's slide_path, and to thumbnail_path when it is
 * present. Blank thumbnails come out as "".
 */
export function mapRecordPaths(table: Table, rule: PathRule, logger: Logger = silentLogger): Table {
  const columns = table.columns.includes("thumbnail_path")
    ? table.columns
    : [...table.columns, "thumbnail_path"];

  const rows = table.rows.map((row) => {
    const slide = row.slide_path;
    const thumb = row.thumbnail_path;
    return {
      ...row,
      slide_path: isBlank(slide) ? slide : transformPath(slide, rule, logger),
      thumbnail_path: isBlank(thumb) ? "" : transformPath(thumb, rule, logger),
    };
  });

  return { columns, rows };
}
