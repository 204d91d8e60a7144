import { Command, Option } from "clipanion";
import type { OrphanPolicy } from "../../config/types.js";
import { errorMessage } from "../../errors.js";
import type { TimelineItem } from "../../query/facade.js";
import { parseOptionalInt, withReadlog } from "../open.js";

function formatItem(item: TimelineItem): string {
  const details = item.details.map((d) => `${d.label}: ${d.value}`).join(" | ");
  const head = `${item.occurredAt}  ${item.entityType}#${item.entityId}  ${item.action}  ${item.title}`;
  return details ? `${head}  (${details})` : head;
}

export class TimelineListCommand extends Command {
  static override paths = [["timeline", "list"]];

  static override usage = Command.Usage({
    description: "List timeline events, newest first",
    examples: [
      ["Global timeline", "readlog timeline list"],
      ["One user's timeline", "readlog timeline list --user 3 --limit 50"],
      ["Next page", "readlog timeline list --cursor MTcwMDAwMDAwMDAwMDo0Mg"],
    ],
  });

  config = Option.String("--config,-c", { description: "Path to config file", required: false });
  user = Option.String("--user", { description: "Only events attributed to this user id", required: false });
  limit = Option.String("--limit", { description: "Page size", required: false });
  cursor = Option.String("--cursor", { description: "Cursor from a previous page", required: false });
  json = Option.Boolean("--json", false, { description: "Print the raw page as JSON" });

  async execute(): Promise<void> {
    try {
      const userId = parseOptionalInt(this.user, "--user");
      const limit = parseOptionalInt(this.limit, "--limit");
      const page = await withReadlog(this.config, (ctx) =>
        ctx.facade.timeline({
          scope: userId !== undefined ? "mine" : "global",
          userId,
          limit,
          cursor: this.cursor,
        }),
      );

      if (this.json) {
        this.context.stdout.write(JSON.stringify(page, null, 2) + "\n");
        return;
      }
      if (page.items.length === 0) {
        this.context.stdout.write("No timeline events.\n");
        return;
      }
      for (const item of page.items) {
        this.context.stdout.write(formatItem(item) + "\n");
      }
      if (page.nextCursor) {
        this.context.stdout.write(`Next cursor: ${page.nextCursor}\n`);
      }
    } catch (err) {
      this.context.stdout.write(`Failed to list timeline: ${errorMessage(err)}\n`);
      process.exitCode = 1;
    }
  }
}

export class TimelineRebuildCommand extends Command {
  static override paths = [["timeline", "rebuild"]];

  static override usage = Command.Usage({
    description: "Refresh denormalized timeline payloads from current entity state",
    examples: [
      ["Full rebuild", "readlog timeline rebuild"],
      ["Drop events of deleted entities", "readlog timeline rebuild --orphans prune"],
      ["Continue an interrupted run", "readlog timeline rebuild --resume"],
    ],
  });

  config = Option.String("--config,-c", { description: "Path to config file", required: false });
  batchSize = Option.String("--batch-size", { description: "Entities per transaction", required: false });
  orphans = Option.String("--orphans", { description: "freeze | prune", required: false });
  resume = Option.Boolean("--resume", false, { description: "Continue after the last checkpoint" });

  async execute(): Promise<void> {
    let orphanPolicy: OrphanPolicy | undefined;
    if (this.orphans !== undefined) {
      if (this.orphans !== "freeze" && this.orphans !== "prune") {
        this.context.stdout.write(`Unknown orphan policy: ${this.orphans} (expected freeze or prune)\n`);
        process.exitCode = 1;
        return;
      }
      orphanPolicy = this.orphans;
    }

    try {
      const batchSize = parseOptionalInt(this.batchSize, "--batch-size");
      const report = await withReadlog(this.config, (ctx) =>
        ctx.runs.start({ batchSize, orphanPolicy, resume: this.resume }),
      );

      const out = this.context.stdout;
      if (report.resumedFrom) {
        out.write(`Resumed after ${report.resumedFrom.entityType}#${report.resumedFrom.entityId}\n`);
      }
      out.write(`Scanned:  ${report.scanned}\n`);
      out.write(`Updated:  ${report.updated}\n`);
      out.write(`Orphaned: ${report.orphaned}\n`);
      out.write(`Pruned:   ${report.pruned}\n`);
      out.write(`Errors:   ${report.errors}\n`);
      out.write(`Batches:  ${report.batches}\n`);
      if (!report.completed) {
        out.write("Rebuild interrupted; run again with --resume to continue.\n");
      }
      if (report.errors > 0) process.exitCode = 1;
    } catch (err) {
      this.context.stdout.write(`Rebuild failed: ${errorMessage(err)}\n`);
      process.exitCode = 1;
    }
  }
}
