import { createRetryEnvelope } from "../../core/retry/retry-envelopes";
import type { RetryDelayPolicy, RetryEnvelope } from "../../types/retry";
import type { LayeredConfigurationSource } from "../configuration-source";

const POLICIES: readonly RetryDelayPolicy[] = ["immediate", "linear", "exponential"];

function isPolicy(value: unknown): value is RetryDelayPolicy {
  return typeof value === "string" && POLICIES.some((policy) => policy === value);
}

export class RetrySection {
  read(source: LayeredConfigurationSource): RetryEnvelope {
    const c = source.getSection("retry");
    const defaults = createRetryEnvelope();
    const policy = c.raw("policy");
    return {
      policy: isPolicy(policy) ? policy : defaults.policy,
      maxAttempts: c.number("maxAttempts", defaults.maxAttempts),
      initialDelayMs: c.number("initialDelayMs", defaults.initialDelayMs),
      multiplier: c.number("multiplier", defaults.multiplier),
      maxDelayMs: c.number("maxDelayMs", defaults.maxDelayMs),
    };
  }
}
