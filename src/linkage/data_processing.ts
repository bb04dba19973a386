/**
 * Data processing step: merged table → publishable table.
 *
 * Order: drop rows without slides, apply the SDPC rule, rewrite paths,
 * then run any caller-supplied predicates against the rewritten rows.
 */

import type { Logger } from "../shared/logger.js";
import type { Table } from "../tables/csv_table.js";
import { mapRecordPaths } from "./path_mapper.js";
import type { PathRule } from "./path_mapper.js";
import {
  applyExtraFilters,
  applySdpcRule,
  dropMissingSlides,
} from "./record_filter.js";
import type { RecordPredicate } from "./record_filter.js";

export interface ProcessingPolicy {
  pathRule: PathRule;
  ignoreSdpc: boolean;
  extraFilters: readonly RecordPredicate[];
}

export function processMergedTable(table: Table, policy: ProcessingPolicy, logger: Logger): Table {
  const withSlides = dropMissingSlides(table);
  const dropped = table.rows.length - withSlides.rows.length;
  if (dropped > 0) logger.debug(`Dropped ${dropped} rows without slide_path`);

  const usable = applySdpcRule(withSlides, policy.ignoreSdpc);
  const sdpcDropped = withSlides.rows.length - usable.rows.length;
  if (sdpcDropped > 0) {
    logger.debug(
      `Dropped ${sdpcDropped} SDPC rows (${policy.ignoreSdpc ? "SDPC ignored" : "missing thumbnail"})`,
    );
  }

  const mapped = mapRecordPaths(usable, policy.pathRule, logger);
  return applyExtraFilters(mapped, policy.extraFilters);
}
