import { DEFAULT_MAX_CONCURRENT_ACTIONS } from "../../device/device-action-dispatcher";
import type { ActionsConfig, CommitReportConfig } from "../../types/configuration";
import type { LayeredConfigurationSource, SectionReader } from "../configuration-source";

export const DEFAULT_REPORT_TIMEOUT_MS = 30_000;

export class ActionsSection {
  read(source: LayeredConfigurationSource): ActionsConfig {
    const c = source.getSection("actions");
    return {
      maxConcurrent: c.number("maxConcurrent", DEFAULT_MAX_CONCURRENT_ACTIONS),
      onCommand: c.stringArray("onCommand"),
      offCommand: c.stringArray("offCommand"),
      speechCommand: c.stringArray("speechCommand"),
      commitReport: this.readCommitReport(c),
    };
  }

  private readCommitReport(c: SectionReader): CommitReportConfig | undefined {
    const raw = c.record("commitReport");
    const endpoint = raw?.endpoint;
    if (!raw || typeof endpoint !== "string" || endpoint === "") {
      return undefined;
    }
    const owners: Record<string, string> = {};
    const rawOwners = raw.owners;
    if (typeof rawOwners === "object" && rawOwners !== null) {
      for (const [repository, owner] of Object.entries(rawOwners)) {
        if (typeof owner === "string") {
          owners[repository] = owner;
        }
      }
    }
    return {
      endpoint,
      target: typeof raw.target === "string" ? raw.target : undefined,
      username: typeof raw.username === "string" ? raw.username : undefined,
      password: typeof raw.password === "string" ? raw.password : undefined,
      owners,
      timeoutMs: typeof raw.timeoutMs === "number" ? raw.timeoutMs : DEFAULT_REPORT_TIMEOUT_MS,
    };
  }
}
