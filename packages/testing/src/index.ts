import {
  AllowAllGate,
  FakeEventBus,
  FakeLogger,
  MemoryBlobStorage,
  MemoryDocumentStore,
} from "@weave/adapters";
import {
  type AccessGate,
  type EngineConfigOverrides,
  type JsonObject,
  type NodeProcessor,
  type RoutingAdviceRequest,
  type RoutingAdvisor,
  WorkflowState,
} from "@weave/core";
import { createWorkflowEngine, sleep, type WorkflowEngine } from "@weave/engine";

export {
  AllowAllGate,
  FakeEventBus,
  FakeLogger,
  MemoryBlobStorage,
  MemoryDocumentStore,
};

export const TEST_TENANT = "tenant-test";

export interface FakeEngineDeps {
  documents: MemoryDocumentStore;
  blobs: MemoryBlobStorage;
  logger: FakeLogger;
  gate: AccessGate;
  bus: FakeEventBus;
}

export function createFakeEngineDeps(
  overrides?: Partial<FakeEngineDeps>,
): FakeEngineDeps {
  return {
    documents: new MemoryDocumentStore(),
    blobs: new MemoryBlobStorage(),
    logger: new FakeLogger(),
    gate: new AllowAllGate(),
    bus: new FakeEventBus(),
    ...overrides,
  };
}

export interface TestEngineOptions {
  deps?: Partial<FakeEngineDeps>;
  config?: EngineConfigOverrides;
  advisor?: RoutingAdvisor;
  random?: () => number;
}

export interface TestEngine {
  engine: WorkflowEngine;
  deps: FakeEngineDeps;
}

/** A fully in-memory engine with a fake logger and bus. */
export function createTestEngine(options: TestEngineOptions = {}): TestEngine {
  const deps = createFakeEngineDeps(options.deps);
  const engine = createWorkflowEngine({
    ...deps,
    ...(options.config ? { config: options.config } : {}),
    ...(options.advisor ? { advisor: options.advisor } : {}),
    ...(options.random ? { random: options.random } : {}),
  });
  return { engine, deps };
}

export function createTestState(
  data: JsonObject = {},
  executionId = "exec-test",
  workflowId = "wf-test",
): WorkflowState {
  return WorkflowState.create({ executionId, workflowId, data });
}

/** Returns the input unchanged. */
export const passThrough: NodeProcessor = async (state) => state;

/** Merges fixed values into the state. */
export function setValues(values: JsonObject): NodeProcessor {
  return async (state) => state.merge(values);
}

export function failWith(message: string): NodeProcessor {
  return async () => {
    throw new Error(message);
  };
}

/** Waits `ms` (abortable through the node signal), then merges `values`. */
export function delayed(ms: number, values: JsonObject = {}): NodeProcessor {
  return async (state, signal) => {
    await sleep(ms, signal);
    return state.merge(values);
  };
}

/** Never settles on its own; rejects once the node signal aborts. */
export const hang: NodeProcessor = (_state, signal) =>
  new Promise<WorkflowState>((_, reject) => {
    signal.addEventListener(
      "abort",
      () =>
        reject(
          signal.reason instanceof Error ? signal.reason : new Error("aborted"),
        ),
      { once: true },
    );
  });

export type ScriptedAdvice =
  | { advice: unknown }
  | { error: Error }
  | { hang: true };

/**
 * Routing advisor that replays queued responses in order and records every
 * request it receives. The last response repeats once the queue runs dry.
 */
export class ScriptedRoutingAdvisor implements RoutingAdvisor {
  public readonly requests: RoutingAdviceRequest[] = [];

  constructor(private readonly script: ScriptedAdvice[]) {}

  public async recommend(
    request: RoutingAdviceRequest,
    signal: AbortSignal,
  ): Promise<unknown> {
    this.requests.push(request);
    const step =
      this.script.length > 1 ? this.script.shift() : this.script[0];
    if (!step) {
      throw new Error("ScriptedRoutingAdvisor has no responses");
    }
    if ("error" in step) {
      throw step.error;
    }
    if ("hang" in step) {
      return new Promise<unknown>((_, reject) => {
        signal.addEventListener(
          "abort",
          () => reject(new Error("advisor aborted")),
          { once: true },
        );
      });
    }
    return step.advice;
  }
}
