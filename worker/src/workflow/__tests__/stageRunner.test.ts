import type { StageHandlers, StageRejection } from "../../stages/contracts";
import { StageRunner } from "../stageRunner";

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

const rejection: StageRejection = { statusCode: 400, error: "test", missing: [] };

function gatedHandlers() {
  let release: () => void = () => {};
  const gate = new Promise<void>((resolve) => {
    release = resolve;
  });
  const calls: string[] = [];
  const handler = (name: string) => async () => {
    calls.push(name);
    await gate;
    return rejection;
  };
  const handlers: StageHandlers = {
    segmentation: handler("segmentation"),
    vlm_processing: handler("vlm_processing"),
    llm_enhancement: handler("llm_enhancement"),
    results_storage: handler("results_storage"),
  };
  return { handlers, calls, release: () => release() };
}

describe("StageRunner", () => {
  it("turns work away once a stage's queue is full", async () => {
    const { handlers, calls, release } = gatedHandlers();
    const runner = new StageRunner(handlers, { concurrency: 1, maxPending: 1 });

    const first = runner.invoke("segmentation", {});
    await flush();
    const second = runner.invoke("segmentation", {});
    await flush();
    expect(runner.load().segmentation).toEqual({ active: 1, pending: 1 });

    await expect(runner.invoke("segmentation", {})).rejects.toMatchObject({
      errorType: "TooManyRequestsException",
      kind: "throttling",
    });

    release();
    await expect(first).resolves.toEqual(rejection);
    await expect(second).resolves.toEqual(rejection);
    expect(calls).toEqual(["segmentation", "segmentation"]);
  });

  it("keeps a separate pool per stage", async () => {
    const { handlers, calls, release } = gatedHandlers();
    const runner = new StageRunner(handlers, { concurrency: 1, maxPending: 1 });

    const seg = runner.invoke("segmentation", {});
    await flush();
    const vlm = runner.invoke("vlm_processing", {});
    await flush();

    expect(calls).toEqual(["segmentation", "vlm_processing"]);
    release();
    await Promise.all([seg, vlm]);
  });

  it("requires at least one slot", () => {
    const { handlers } = gatedHandlers();
    expect(() => new StageRunner(handlers, { concurrency: 0, maxPending: 1 })).toThrow(RangeError);
  });
});
