import type { CreateOutcome, ParseOutcome } from '../../core/runner/types.js';
import type { IFormatter } from './types.js';

/**
 * JSON output formatter for machine consumption.
 */
export class JsonFormatter implements IFormatter {
  formatParse(result: ParseOutcome): string {
    return JSON.stringify(
      {
        template: result.template,
        mount_point: result.mountPoint,
        path: result.target,
        matches: result.matches,
      },
      null,
      2
    );
  }

  formatCreate(result: CreateOutcome, dryRun: boolean): string {
    return JSON.stringify(
      {
        template: result.template,
        root: result.root,
        dry_run: dryRun,
        planned: result.planned.map((entry) => ({
          path: entry.path,
          folder: entry.folder,
          permission: entry.permission.toString(8),
        })),
        created: result.created,
        existing: result.existing,
        skipped: result.skipped,
      },
      null,
      2
    );
  }
}
