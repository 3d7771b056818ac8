/**
 * Forwards engine events to pino. The logger is looked up on the first
 * event, after `--verbose` and the settings file have set the level.
 */

import type { SyncEvent, SyncReporter } from "@cadsync/core";
import type { Logger } from "./logger.js";

export class LogReporter implements SyncReporter {
  private readonly factory: () => Logger;
  private logger: Logger | undefined;

  constructor(factory: () => Logger) {
    this.factory = factory;
  }

  private get log(): Logger {
    if (!this.logger) {
      this.logger = this.factory();
    }
    return this.logger;
  }

  report(event: SyncEvent): void {
    switch (event.type) {
      case "target":
        this.log.info(`${event.dryRun ? "[DRY RUN] " : ""}${event.operation} ${event.name}`);
        break;
      case "document":
        this.log.debug(`${event.operation} document '${event.name}' (${event.documentId}) in ${event.localDir}`);
        break;
      case "conflict":
        if (event.forced) {
          this.log.warn(`${event.report.filepath}: ${event.report.message} (forced)`);
        } else {
          this.log.warn(`${event.report.filepath}: ${event.report.message}`);
        }
        break;
      case "backup":
        this.log.debug(`Backed up ${event.source} to ${event.backup}`);
        break;
      case "outcome": {
        const { outcome } = event;
        const line = `${outcome.filepath}: ${outcome.message}`;
        if (outcome.conflict || !outcome.success) {
          this.log.error(line);
        } else if (outcome.skipped) {
          this.log.debug(line);
        } else {
          this.log.info(line);
        }
        break;
      }
    }
  }
}
