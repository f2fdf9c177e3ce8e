import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { Session } from "../systems/research/session.js";
import type { SessionCollaborators } from "../systems/research/types.js";
import {
  FakeDeriver,
  FakeDiscoverer,
  FakeExtractor,
  FakeSynthesizer,
  RecordingObservability,
  SETTINGS,
  answerGoals,
  delay,
  records,
} from "./fakes.js";

function collaborators(overrides: Partial<SessionCollaborators> = {}): SessionCollaborators {
  return {
    deriver: new FakeDeriver(),
    synthesizer: new FakeSynthesizer(),
    discoverer: new FakeDiscoverer(),
    extractor: new FakeExtractor(),
    ...overrides,
  };
}

const FIXED_NOW = new Date("2024-01-02T03:04:05.678Z");

describe("Session.initialize", () => {
  it("assigns a timestamp-derived id", () => {
    const session = new Session({ topic: "T" }, collaborators(), { defaults: SETTINGS, now: () => FIXED_NOW });

    assert.equal(session.initialize().success, true);

    const status = session.getStatus();
    assert.equal(status.state, "initialized");
    assert.match(status.sessionId ?? "", /^research-20240102030405678-[0-9a-f]{8}$/);
    assert.equal(status.maxDepth, 2);
    assert.equal(status.hasResults, false);
  });

  it("rejects a blank topic", () => {
    const session = new Session({ topic: "   " }, collaborators(), { defaults: SETTINGS });
    const result = session.initialize();

    assert.equal(result.success, false);
    assert.equal(session.getState(), "error");
    assert.equal(session.getError(), "Invalid research input: topic: Research topic must not be empty");
  });

  it("rejects malformed settings", () => {
    const session = new Session({ topic: "T", settings: { maxDepth: 0 } }, collaborators(), { defaults: SETTINGS });
    session.initialize();

    assert.equal(session.getState(), "error");
    assert.equal(
      session.getError(),
      "Invalid research input: settings.maxDepth: Number must be greater than or equal to 1"
    );
  });

  it("refuses to run before initialize", async () => {
    const session = new Session({ topic: "T" }, collaborators(), { defaults: SETTINGS });
    const result = await session.run();

    assert.equal(result.success, false);
    if (!result.success) {
      assert.equal(result.error.code, "INVALID_STATE");
    }
    assert.equal(session.getState(), "none");
  });
});

describe("Session.run", () => {
  it("feeds each round's findings into the next derivation", async () => {
    const deriver = new FakeDeriver((round) =>
      round === 1 ? [{ query: "T", goals: ["g1", "g2"] }] : [{ query: "T2", goals: ["g3"] }]
    );
    const extractor = new FakeExtractor((urls, goals) => ({
      answers: answerGoals(goals, (goal) => (goal === "g1" ? "A" : goal === "g2" ? "NA" : `about ${goal}`)),
      sources: urls,
    }));
    const synthesizer = new FakeSynthesizer();
    const session = new Session(
      { topic: "T" },
      collaborators({ deriver, extractor, synthesizer, discoverer: new FakeDiscoverer(() => records("https://a.test", "https://b.test")) }),
      { defaults: SETTINGS }
    );
    session.initialize();

    const result = await session.run();

    assert.equal(result.success, true);
    assert.deepEqual(
      deriver.calls.map((call) => call.priorFindings),
      [[], ["T\n- g1: A"]]
    );
    assert.equal(deriver.calls[0]?.batchSize, 3);
    assert.deepEqual(session.getRounds()[0]?.findings, "T\n- g1: A");
    assert.deepEqual(synthesizer.calls, [{ findings: ["T\n- g1: A", "T2\n- g3: about g3"], topic: "T" }]);
    assert.equal(result.success && result.output.mainReport, "Report on T");

    const status = session.getStatus();
    assert.equal(status.state, "completed");
    assert.equal(status.hasResults, true);
    assert.equal(status.currentRound, 2);
    assert.notEqual(status.startedAt, null);
    assert.notEqual(status.endedAt, null);
  });

  it("runs exactly maxDepth rounds, strictly one after another", async () => {
    const timeline: string[] = [];
    const deriver = new FakeDeriver((round) => {
      timeline.push(`derive ${round}`);
      return [
        { query: `r${round}-a`, goals: ["g"] },
        { query: `r${round}-b`, goals: ["g"] },
      ];
    });
    const discoverer = new FakeDiscoverer(async (query) => {
      await delay(query.endsWith("a") ? 10 : 1);
      timeline.push(`done ${query}`);
      return records(`https://${query}.test`);
    });
    const session = new Session(
      { topic: "T", settings: { maxDepth: 3 } },
      collaborators({ deriver, discoverer }),
      { defaults: SETTINGS }
    );
    session.initialize();

    await session.run();

    assert.equal(session.getRounds().length, 3);
    assert.deepEqual(timeline, [
      "derive 1",
      "done r1-b",
      "done r1-a",
      "derive 2",
      "done r2-b",
      "done r2-a",
      "derive 3",
      "done r3-b",
      "done r3-a",
    ]);
  });

  it("substitutes the topic-only query when derivation returns nothing", async () => {
    const observability = new RecordingObservability();
    const discoverer = new FakeDiscoverer();
    const session = new Session(
      { topic: "grid storage", settings: { maxDepth: 1 } },
      collaborators({ deriver: new FakeDeriver(() => []), discoverer }),
      { defaults: SETTINGS, observability }
    );
    session.initialize();

    const result = await session.run();

    assert.equal(result.success, true);
    assert.deepEqual(discoverer.calls, [{ query: "grid storage", count: 3 }]);
    assert.equal(Object.keys(session.getRounds()[0]?.jobs ?? {}).length, 1);
    assert.ok(observability.eventTypes().includes("derive.fallback"));
  });

  it("substitutes the topic-only query when derivation throws", async () => {
    const session = new Session(
      { topic: "T", settings: { maxDepth: 1 } },
      collaborators({
        deriver: new FakeDeriver(() => {
          throw new Error("model unavailable");
        }),
      }),
      { defaults: SETTINGS }
    );
    session.initialize();

    await session.run();

    assert.equal(session.getState(), "completed");
    assert.deepEqual(session.getRounds()[0]?.queries, ["T"]);
  });

  it("truncates an oversized batch", async () => {
    const deriver = new FakeDeriver(() =>
      ["a", "b", "c", "d", "e"].map((query) => ({ query, goals: ["g"] }))
    );
    const session = new Session(
      { topic: "T", settings: { maxDepth: 1, batchSize: 2 } },
      collaborators({ deriver }),
      { defaults: SETTINGS }
    );
    session.initialize();

    await session.run();

    assert.deepEqual(session.getRounds()[0]?.queries, ["a", "b"]);
    assert.equal(deriver.calls[0]?.batchSize, 2);
  });

  it("degrades a failed synthesis to a report over the raw findings", async () => {
    const session = new Session(
      { topic: "T", settings: { maxDepth: 1 } },
      collaborators({
        synthesizer: new FakeSynthesizer(() => {
          throw new Error("model overloaded");
        }),
      }),
      { defaults: SETTINGS }
    );
    session.initialize();

    const result = await session.run();

    assert.equal(result.success, true);
    assert.deepEqual(session.getResults(), {
      mainReport: "Failed to synthesize research report: model overloaded",
      keyLearnings: ["query 1\n- goal 1: answer: goal 1"],
      areasCovered: [],
      areasToExplore: [],
    });
    assert.equal(session.getState(), "completed");
  });

  it("degrades an empty report", async () => {
    const session = new Session(
      { topic: "T", settings: { maxDepth: 1 } },
      collaborators({
        synthesizer: new FakeSynthesizer(() => ({
          mainReport: "  ",
          keyLearnings: [],
          areasCovered: [],
          areasToExplore: [],
        })),
      }),
      { defaults: SETTINGS }
    );
    session.initialize();

    await session.run();

    assert.equal(
      session.getResults()?.mainReport,
      "Failed to synthesize research report: synthesizer returned an empty report"
    );
  });

  it("ends in error when a round produces no findings", async () => {
    const observability = new RecordingObservability();
    const synthesizer = new FakeSynthesizer();
    const deriver = new FakeDeriver();
    const session = new Session(
      { topic: "T" },
      collaborators({ deriver, synthesizer, discoverer: new FakeDiscoverer(() => []) }),
      { defaults: SETTINGS, observability }
    );
    session.initialize();

    const result = await session.run();
    const [round] = session.getRounds();
    const [jobId] = Object.keys(round?.jobs ?? {});

    assert.equal(result.success, false);
    assert.equal(session.getState(), "error");
    assert.equal(session.getError(), `Research failed in round 1: All 1 jobs failed: ${jobId}: no results found`);
    assert.equal(deriver.calls.length, 1);
    assert.equal(synthesizer.calls.length, 0);
    assert.equal(round?.state, "failed");
    assert.equal(session.getStatus().hasResults, false);
    assert.deepEqual(observability.eventTypes().slice(-2), ["round.failed", "session.failed"]);
  });

  it("skips an empty round under the skip policy", async () => {
    const discoverer = new FakeDiscoverer((query) => (query === "query 1" ? [] : records("https://a.test")));
    const synthesizer = new FakeSynthesizer();
    const session = new Session(
      { topic: "T", settings: { emptyRoundPolicy: "skip" } },
      collaborators({ discoverer, synthesizer }),
      { defaults: SETTINGS }
    );
    session.initialize();

    const result = await session.run();

    assert.equal(result.success, true);
    assert.deepEqual(
      session.getRounds().map((round) => round.state),
      ["failed", "completed"]
    );
    assert.deepEqual(synthesizer.calls[0]?.findings, ["query 2\n- goal 2: answer: goal 2"]);
  });

  it("reports status while researching", async () => {
    const seen: Array<[string, number]> = [];
    let session: Session | null = null;
    const deriver = new FakeDeriver((round) => {
      const status = session?.getStatus();
      if (status) {
        seen.push([status.state, status.currentRound]);
      }
      return [{ query: `query ${round}`, goals: ["g"] }];
    });
    session = new Session({ topic: "T" }, collaborators({ deriver }), { defaults: SETTINGS });
    session.initialize();

    await session.run();

    assert.deepEqual(seen, [
      ["researching", 1],
      ["researching", 2],
    ]);
  });

  it("records the session lifecycle", async () => {
    const observability = new RecordingObservability();
    const session = new Session({ topic: "T", settings: { maxDepth: 1 } }, collaborators(), {
      defaults: SETTINGS,
      observability,
    });
    session.initialize();

    await session.run();

    assert.deepEqual(observability.eventTypes(), [
      "session.started",
      "round.started",
      "job.completed",
      "round.completed",
      "session.completed",
    ]);
    assert.ok(observability.metrics.some((metric) => metric.name === "session.duration_ms"));
  });

  it("tells the deriver and synthesizer which session and round they serve", async () => {
    const deriver = new FakeDeriver();
    const synthesizer = new FakeSynthesizer();
    const session = new Session({ topic: "T" }, collaborators({ deriver, synthesizer }), {
      defaults: SETTINGS,
      correlationId: "trace-1",
    });
    session.initialize();
    const sessionId = session.getStatus().sessionId ?? undefined;

    await session.run();

    assert.deepEqual(deriver.contexts, [
      { sessionId, correlationId: "trace-1", round: 1 },
      { sessionId, correlationId: "trace-1", round: 2 },
    ]);
    assert.deepEqual(synthesizer.contexts, [{ sessionId, correlationId: "trace-1", round: undefined }]);
  });

  it("falls back to the session id as correlation id for agent calls", async () => {
    const deriver = new FakeDeriver();
    const session = new Session({ topic: "T", settings: { maxDepth: 1 } }, collaborators({ deriver }), {
      defaults: SETTINGS,
    });
    session.initialize();
    const sessionId = session.getStatus().sessionId ?? undefined;

    await session.run();

    assert.equal(deriver.contexts[0]?.correlationId, sessionId);
  });

  it("runs only once", async () => {
    const session = new Session({ topic: "T", settings: { maxDepth: 1 } }, collaborators(), { defaults: SETTINGS });
    session.initialize();
    await session.run();

    const again = await session.run();

    assert.equal(again.success, false);
    assert.equal(session.getState(), "completed");
  });
});
