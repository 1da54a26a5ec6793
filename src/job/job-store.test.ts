import { describe, it, expect } from "vitest";
import { InMemoryJobStore } from "./job-store";
import { JobTransitionError } from "../errors";
import type { JobState } from "../types";

describe("InMemoryJobStore", () => {
  it("creates pending jobs", () => {
    const store = new InMemoryJobStore();
    const state = store.create("job-1");

    expect(state.status).toBe("pending");
    expect(store.get("job-1")).toBe(state);
    expect(store.jobIds()).toEqual(["job-1"]);
  });

  it("rejects duplicate and unknown jobs", () => {
    const store = new InMemoryJobStore();
    store.create("job-1");

    expect(() => store.create("job-1")).toThrow("Job already exists: job-1");
    expect(() => store.apply("job-2", { status: "running" })).toThrow("Unknown job: job-2");
  });

  it("replaces the snapshot on every transition", () => {
    const store = new InMemoryJobStore();
    const pending = store.create("job-1");
    const running = store.apply("job-1", { status: "running", progress: 10 });

    expect(store.get("job-1")).toBe(running);
    expect(pending.status).toBe("pending");
    expect(Object.isFrozen(running)).toBe(true);
  });

  it("notifies subscribers in write order", () => {
    const store = new InMemoryJobStore();
    store.create("job-1");

    const seen: number[] = [];
    store.subscribe("job-1", (state) => seen.push(state.progress));

    store.apply("job-1", { status: "running", progress: 0 });
    store.apply("job-1", { status: "running", progress: 10 });
    store.apply("job-1", { status: "running", progress: 30 });

    expect(seen).toEqual([0, 10, 30]);
  });

  it("stops notifying after unsubscribe", () => {
    const store = new InMemoryJobStore();
    store.create("job-1");

    const seen: JobState[] = [];
    const unsubscribe = store.subscribe("job-1", (state) => seen.push(state));
    store.apply("job-1", { status: "running" });
    unsubscribe();
    store.apply("job-1", { status: "failed", errorMessage: "stopped" });

    expect(seen.map((s) => s.status)).toEqual(["running"]);
  });

  it("keeps the state when a transition is rejected", () => {
    const store = new InMemoryJobStore();
    store.create("job-1");
    store.apply("job-1", { status: "running", progress: 50 });

    expect(() => store.apply("job-1", { status: "running", progress: 10 })).toThrow(
      JobTransitionError,
    );
    expect(store.get("job-1")?.progress).toBe(50);
  });

  it("isolates jobs", () => {
    const store = new InMemoryJobStore();
    store.create("job-1");
    store.create("job-2");

    const seen: string[] = [];
    store.subscribe("job-2", (state) => seen.push(state.jobId));
    store.apply("job-1", { status: "running" });

    expect(seen).toEqual([]);
    expect(store.get("job-2")?.status).toBe("pending");
  });
});
