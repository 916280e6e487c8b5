/**
 * CommandDispatcher: turns a validated option set into exactly one primary
 * action against the update engine, then runs the event loop until the exit
 * coordinator has an outcome.
 *
 * State machine:
 *   INIT → VALIDATING → ACTING → LISTENING → FINISHING → TERMINATED
 *                     ↘ FINISHING      ↘ FINISHING
 *
 * Action precedence: suspend > resume > cancel > (follow, then update).
 */

import type {
  CallResult,
  ExitOutcome,
  ServiceConnector,
  UpdateEngineService,
} from "@otactl/sdk";
import {
  ConnectionError,
  EXIT_OK,
  UsageError,
  failed,
  succeeded,
} from "@otactl/sdk";
import { createLogger, OptionSetSchema, validateInput } from "@otactl/shared";
import type { OptionSet } from "@otactl/shared";
import type { EventLoop } from "../execution/loop.js";
import { createUpdateCallback } from "../callback/update-callback.js";
import {
  createExitCoordinator,
  outcomeFromResult,
  FAILURE_OUTCOME,
  OK_OUTCOME,
} from "../exit/exit-coordinator.js";

const logger = createLogger("CommandDispatcher");

export type DispatcherState =
  | "INIT"
  | "VALIDATING"
  | "ACTING"
  | "LISTENING"
  | "FINISHING"
  | "TERMINATED";

export type PrimaryAction = "suspend" | "resume" | "cancel" | "follow" | "update";

/** Raw flags and positional arguments, as produced by the argument parser. */
export interface DispatchInput {
  flags: Record<string, string | boolean>;
  positional: string[];
}

export interface CommandDispatcherDeps {
  loop: EventLoop;
  /** Acquires the update engine. Only called once validation passed. */
  connect: ServiceConnector;
}

export interface CommandDispatcher {
  /** Dispatch, wait for the outcome, release the service. Resolves to the exit code. */
  run(input: DispatchInput): Promise<number>;
  getState(): DispatcherState;
  /** Every state entered so far, in order. */
  getHistory(): DispatcherState[];
  getOutcome(): ExitOutcome | null;
}

const NOTHING_TO_DO = "Nothing to do. Run with --help for help.";

/** First action that applies, by precedence. */
export function primaryAction(options: OptionSet): PrimaryAction | null {
  if (options.suspend) return "suspend";
  if (options.resume) return "resume";
  if (options.cancel) return "cancel";
  if (options.follow) return "follow";
  if (options.update) return "update";
  return null;
}

export interface ValidatedInput {
  options: OptionSet;
  action: PrimaryAction;
}

/** Validate raw input into an option set. Every failure is a UsageError. */
export function validateOptions(input: DispatchInput): CallResult<ValidatedInput> {
  if (input.positional.length > 0) {
    return failed(
      new UsageError(
        `Found a positional argument '${input.positional[0]}'. ` +
          "If you want to pass a value to a flag, pass it as --flag=value.",
      ),
    );
  }

  const parsed = validateInput(OptionSetSchema, input.flags);
  if (!parsed.success) {
    return failed(new UsageError(`Invalid flags: ${parsed.error}`));
  }
  const options = parsed.data;

  const action = primaryAction(options);
  if (action === null) {
    return failed(new UsageError(NOTHING_TO_DO));
  }
  const willApply = action === "update" || (action === "follow" && options.update);
  if (willApply && options.payload.length === 0) {
    return failed(new UsageError("--update needs a non-empty --payload URI"));
  }
  return succeeded({ options, action });
}

export function createCommandDispatcher(deps: CommandDispatcherDeps): CommandDispatcher {
  const { loop } = deps;
  const coordinator = createExitCoordinator(loop);
  const history: DispatcherState[] = ["INIT"];
  let state: DispatcherState = "INIT";
  let service: UpdateEngineService | null = null;
  let connectionError: ConnectionError | null = null;

  function setState(next: DispatcherState): void {
    logger.debug(`${state} → ${next}`);
    state = next;
    history.push(next);
  }

  function finish(outcome: ExitOutcome): number {
    setState("FINISHING");
    return coordinator.requestExit(outcome);
  }

  async function acquireService(): Promise<void> {
    try {
      service = await deps.connect();
    } catch (err) {
      connectionError =
        err instanceof ConnectionError
          ? err
          : new ConnectionError("update_engine", String(err), { cause: err });
      // Not fatal yet: only actions that use the service fail with it.
      logger.error(`Failed to get the update engine service: ${connectionError.message}`);
    }
  }

  async function withService<T>(
    call: (svc: UpdateEngineService) => Promise<CallResult<T>>,
  ): Promise<CallResult<T>> {
    if (service) {
      return call(service);
    }
    return failed(connectionError ?? new ConnectionError("update_engine", "not connected"));
  }

  async function follow(): Promise<boolean> {
    const callback = createUpdateCallback(coordinator);
    const bound = await withService((svc) => svc.bind(callback));
    if (!bound.ok || !bound.value) {
      const reason = bound.ok ? "service refused the binding" : bound.error.message;
      logger.error(`Failed to bind() the update engine: ${reason}`);
      return false;
    }

    service?.onServiceDied(() => {
      coordinator.requestExit(
        outcomeFromResult(
          failed(new ConnectionError("update_engine", "connection lost while following the update")),
        ),
      );
    });
    setState("LISTENING");
    return true;
  }

  async function onInit(input: DispatchInput): Promise<number> {
    setState("VALIDATING");
    const validated = validateOptions(input);
    if (!validated.ok) {
      return finish(outcomeFromResult(validated));
    }
    const { options, action } = validated.value;
    logger.setContext({ action });

    setState("ACTING");
    await acquireService();

    switch (action) {
      case "suspend":
        return finish(outcomeFromResult(await withService((svc) => svc.suspend())));
      case "resume":
        return finish(outcomeFromResult(await withService((svc) => svc.resume())));
      case "cancel":
        return finish(outcomeFromResult(await withService((svc) => svc.cancel())));
      default:
        break;
    }

    const keepRunning = options.follow;
    if (keepRunning && !(await follow())) {
      return finish(FAILURE_OUTCOME);
    }

    if (options.update) {
      const applied = await withService((svc) => svc.applyPayload(options.payload, options.headers));
      if (!applied.ok) {
        return finish(outcomeFromResult(applied));
      }
      logger.info("Payload application started", { payload: options.payload });
    }

    if (!keepRunning) {
      return finish(OK_OUTCOME);
    }
    logger.info("Following the update until it completes");
    return EXIT_OK;
  }

  async function release(): Promise<void> {
    if (!service) return;
    try {
      await service.close();
    } catch (err) {
      logger.warn("Failed to close the update engine connection", { error: String(err) });
    }
  }

  return {
    async run(input: DispatchInput): Promise<number> {
      if (state !== "INIT") {
        throw new Error(`Dispatcher already ran (state: ${state})`);
      }

      let code = await onInit(input);
      if (code === EXIT_OK) {
        code = await loop.run();
      }
      setState("TERMINATED");
      await release();
      return code;
    },

    getState(): DispatcherState {
      return state;
    },

    getHistory(): DispatcherState[] {
      return [...history];
    },

    getOutcome(): ExitOutcome | null {
      return coordinator.getOutcome();
    },
  };
}
