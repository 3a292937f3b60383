import type { Logger } from "../core/logger";
import { errorMessage } from "../core/errors";
import type { HardwareCapability } from "../device/hardware/hardware-capability";
import type { ConversationSession, RunTurnOptions } from "./conversation-session";

/**
 * Resolves true when the user asked for a new turn, false when no more turns will come.
 */
export type TurnTrigger = () => Promise<boolean>;

export interface ConversationLoopOptions extends RunTurnOptions {
  /** Stop after the first conversation, i.e. the first turn that does not continue. */
  once?: boolean;
  indicator?: Pick<HardwareCapability, "setIndicator">;
  logger?: Logger;
}

/**
 * Runs turns until the trigger reports the end or `once` is satisfied.
 *
 * A turn that asks for a follow-on starts the next one without waiting on
 * the trigger. Returns the number of turns run.
 */
export async function runConversation(
  session: Pick<ConversationSession, "runTurn">,
  trigger: TurnTrigger,
  options: ConversationLoopOptions = {},
): Promise<number> {
  let waitForTrigger = true;
  let turns = 0;

  while (!options.signal?.aborted) {
    if (waitForTrigger && !(await trigger())) {
      break;
    }

    await setIndicator(options, true);
    let continueConversation: boolean;
    try {
      const outcome = await session.runTurn({ signal: options.signal });
      continueConversation = outcome.continueConversation;
    } finally {
      await setIndicator(options, false);
    }
    turns += 1;

    waitForTrigger = !continueConversation;
    if (options.once && !continueConversation) {
      break;
    }
  }
  return turns;
}

/**
 * Runs exactly one turn, whatever it asks for next. Recorded input is sent once.
 */
export async function runSingleTurn(
  session: Pick<ConversationSession, "runTurn">,
  options: ConversationLoopOptions = {},
): Promise<number> {
  if (options.signal?.aborted) {
    return 0;
  }
  await setIndicator(options, true);
  try {
    const outcome = await session.runTurn({ signal: options.signal });
    if (outcome.continueConversation) {
      options.logger?.info("Ignoring follow-on request; recorded input was already sent");
    }
  } finally {
    await setIndicator(options, false);
  }
  return 1;
}

async function setIndicator(options: ConversationLoopOptions, on: boolean): Promise<void> {
  if (!options.indicator) {
    return;
  }
  try {
    await options.indicator.setIndicator(on);
  } catch (error: unknown) {
    options.logger?.warn("Failed to toggle indicator", { on, error: errorMessage(error) });
  }
}
