import type { Logger } from "../../core/logger";
import { phrase } from "../../speech/phrases";
import type { TextToSpeech } from "../../speech/text-to-speech";
import { optionalString } from "../command-params";
import type { CommandRegistry } from "../../types/device-action";
import type { CommitReportClient } from "../reporting/commit-report-client";

export const COMMIT_COUNT_REPORT_COMMAND = "com.example.commands.CommitCountReport";

export const DEFAULT_REPORT_WINDOW_DAYS = 30;

const DAY_MS = 24 * 60 * 60 * 1000;
const DATE_PATTERN = /(\d{4})\D(\d{1,2})\D(\d{1,2})/;

export interface CommitCountReportOptions {
  client: CommitReportClient;
  owners: Readonly<Record<string, string>>;
  speech: TextToSpeech;
  logger: Logger;
  now?: () => Date;
}

/**
 * Midnight UTC of `date`, as `YYYY-MM-DDT00:00:00+00:00`.
 */
export function toReportTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, "0");
  return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}T00:00:00+00:00`;
}

/**
 * Reads a spoken date such as `2024-03-05` or `2024年3月5日`. Empty input yields `fallback`.
 */
export function parseSpokenDate(value: string, fallback: Date): Date {
  if (value.trim() === "") {
    return fallback;
  }
  const match = DATE_PATTERN.exec(value);
  if (!match) {
    throw new Error(`Unrecognized date "${value}"`);
  }
  const [, year, month, day] = match;
  return new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
}

export function registerCommitCountReportHandler(
  dispatcher: CommandRegistry,
  options: CommitCountReportOptions,
): void {
  const { client, owners, speech, logger } = options;
  const now = options.now ?? (() => new Date());

  dispatcher.register(COMMIT_COUNT_REPORT_COMMAND, async (params) => {
    const repository = optionalString(params, "repository");
    const owner = owners[repository];
    if (!owner) {
      logger.warn("No owner configured for repository", { repository });
      await speech.speak(phrase("unknownRepository", { repository }));
      return;
    }

    const today = now();
    const since = parseSpokenDate(
      optionalString(params, "start"),
      new Date(today.getTime() - DEFAULT_REPORT_WINDOW_DAYS * DAY_MS),
    );
    const until = parseSpokenDate(optionalString(params, "end"), today);
    const query = {
      owner,
      repository,
      since: toReportTimestamp(since),
      until: toReportTimestamp(until),
    };
    logger.info("Querying commit count report", query);

    const result = await client.fetchReport(query);
    if (!result.ok) {
      logger.warn("Commit count report returned an error", { error: result.error });
      await speech.speak(phrase("commitReportFailed"));
      return;
    }
    logger.info("Commit count report returned", { row: result.row.raw });
    await speech.speak(
      phrase("commitReport", {
        contributor: result.row.contributor,
        count: result.row.commitCount,
        repository: result.row.repository,
      }),
    );
  });
}
