import axios, { type AxiosInstance } from "axios";
import { isRecord } from "../../core/guards";
import type { CommitReportConfig } from "../../types/configuration";

export interface CommitReportQuery {
  owner: string;
  repository: string;
  /** ISO-8601 lower bound. */
  since: string;
  /** ISO-8601 upper bound. */
  until: string;
}

/**
 * First row of the report: contributor, repository and commit count.
 */
export interface CommitReportRow {
  contributor: string;
  repository: string;
  commitCount: number;
  raw: unknown[];
}

export type CommitReportResult =
  | { ok: true; row: CommitReportRow }
  | { ok: false; error: string };

/**
 * Client for the workflow endpoint that produces commit count reports.
 */
export class CommitReportClient {
  private readonly http: AxiosInstance;

  constructor(
    private readonly config: CommitReportConfig,
    http?: AxiosInstance,
  ) {
    this.http = http ?? axios.create();
  }

  /**
   * Runs the report synchronously on the workflow service.
   *
   * @returns `ok: false` when the service answers with an `error` member or an unexpected body.
   */
  async fetchReport(query: CommitReportQuery): Promise<CommitReportResult> {
    const payload = {
      input: {
        github: {
          target: this.config.target ?? query.owner,
          owner: query.owner,
          name: query.repository,
          since: query.since,
          until: query.until,
        },
      },
    };
    const response = await this.http.post<unknown>(this.config.endpoint, payload, {
      headers: { "Content-Type": "application/json" },
      timeout: this.config.timeoutMs,
      ...(this.config.username !== undefined
        ? { auth: { username: this.config.username, password: this.config.password ?? "" } }
        : {}),
    });
    return parseReport(response.data);
  }
}

export function parseReport(body: unknown): CommitReportResult {
  if (!isRecord(body)) {
    return { ok: false, error: "Report response is not an object" };
  }
  if (body.error !== undefined) {
    return { ok: false, error: typeof body.error === "string" ? body.error : JSON.stringify(body.error) };
  }
  const output = isRecord(body.output) ? body.output : undefined;
  const github = output && isRecord(output.github) ? output.github : undefined;
  const githubOutput = github && isRecord(github.output) ? github.output : undefined;
  const values = githubOutput?.values;
  const first = Array.isArray(values) ? values[0] : undefined;
  if (!Array.isArray(first) || first.length < 6) {
    return { ok: false, error: "Report response has no values" };
  }
  const count = Number(first[5]);
  return {
    ok: true,
    row: {
      contributor: String(first[0]),
      repository: String(first[2]),
      commitCount: Number.isFinite(count) ? count : 0,
      raw: [...first],
    },
  };
}
