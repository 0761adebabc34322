/**
 * engine-machine.ts: lifecycle of the paper engine's tick loop.
 *
 * The machine only records which phase the engine is in. PaperEngine owns the
 * loop itself and sends events as it spawns, signals and joins it.
 */

import { setup, createActor, type StateValue } from "xstate";

export type EngineStatus = "stopped" | "running" | "stopping" | "resetting";

const STATUSES: readonly EngineStatus[] = ["stopped", "running", "stopping", "resetting"];

export type EngineEvent =
  | { type: "START" }
  | { type: "STOP" }
  | { type: "LOOP_EXITED" }
  | { type: "RESET" }
  | { type: "RESET_DONE" };

export const engineMachine = setup({
  types: {
    events: {} as EngineEvent,
  },
}).createMachine({
  id: "engine",
  initial: "stopped",
  // A reset may interrupt any phase.
  on: {
    RESET: ".resetting",
  },
  states: {
    stopped: {
      on: { START: "running" },
    },
    running: {
      on: {
        STOP: "stopping",
        LOOP_EXITED: "stopped",
      },
    },
    // The old loop is still winding down; a START here spawns a new generation.
    stopping: {
      on: {
        START: "running",
        LOOP_EXITED: "stopped",
      },
    },
    resetting: {
      on: { RESET_DONE: "stopped" },
    },
  },
});

export function toEngineStatus(value: StateValue): EngineStatus {
  const status = STATUSES.find((s) => s === value);
  if (!status) {
    throw new Error(`Unexpected engine state: ${JSON.stringify(value)}`);
  }
  return status;
}

export function createEngineActor() {
  const actor = createActor(engineMachine);
  actor.start();
  return actor;
}
