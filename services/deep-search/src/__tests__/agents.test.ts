import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { AgentError } from "@deepsearch/core";

import { createNoOpObservability } from "../shared/observability/console.js";
import { QueryDeriverAgent } from "../systems/research/agents/query-deriver/agent.js";
import { ReportSynthesizerAgent } from "../systems/research/agents/synthesizer/agent.js";
import { FakeExecutor, RecordingObservability } from "./fakes.js";

function deps(executor: FakeExecutor) {
  return { executor, observability: createNoOpObservability() };
}

const DERIVED = JSON.stringify({
  queries: [
    { query: "sodium-ion cell costs 2024", goals: ["What is the cost per kWh?"] },
    { query: "sodium-ion manufacturers", goals: ["Which companies ship cells?", "At what volume?"] },
    { query: "sodium-ion cycle life", goals: ["How many cycles?"] },
  ],
});

describe("QueryDeriverAgent", () => {
  it("parses a fenced reply and caps it at the batch size", async () => {
    const executor = new FakeExecutor([`Here is the plan:\n\`\`\`json\n${DERIVED}\n\`\`\``]);
    const agent = new QueryDeriverAgent(deps(executor));

    const queries = await agent.derive("sodium-ion batteries", [], 2);

    assert.deepEqual(queries, [
      { query: "sodium-ion cell costs 2024", goals: ["What is the cost per kWh?"] },
      { query: "sodium-ion manufacturers", goals: ["Which companies ship cells?", "At what volume?"] },
    ]);
  });

  it("prompts with the prior findings and its own profile", async () => {
    const executor = new FakeExecutor([DERIVED]);
    const agent = new QueryDeriverAgent(deps(executor), { language: "de" });

    await agent.derive("T", ["T\n- g1: A"], 3);

    const request = executor.requests[0];
    assert.ok(request);
    assert.match(request.prompt, /T\n- g1: A/);
    assert.match(request.prompt, /Write up to 3 search queries/);
    assert.match(request.prompt, /Queries are in de/);
    assert.equal(request.profile.model, "haiku");
    assert.deepEqual(request.profile.tools, []);
    assert.ok(request.systemPrompt);
  });

  it("traces the run under the caller's session and round", async () => {
    const observability = new RecordingObservability();
    const agent = new QueryDeriverAgent({ executor: new FakeExecutor([DERIVED]), observability });

    await agent.derive("T", [], 3, { sessionId: "research-1-abcdef12", correlationId: "trace-1", round: 2 });

    const started = observability.sessions[0];
    assert.ok(started);
    assert.equal(started.agentName, "query-deriver");
    assert.equal(started.correlationId, "trace-1");
    assert.deepEqual(started.metadata, { researchSessionId: "research-1-abcdef12", round: 2 });
  });

  it("tells the model when nothing is known yet", async () => {
    const executor = new FakeExecutor([DERIVED]);
    await new QueryDeriverAgent(deps(executor)).derive("T", [], 3);

    assert.match(executor.requests[0]?.prompt ?? "", /Nothing yet\. This is the first round/);
  });

  it("throws an AgentError when the executor fails", async () => {
    const agent = new QueryDeriverAgent(deps(new FakeExecutor([{ error: "quota exceeded" }])));

    await assert.rejects(agent.derive("T", [], 3), (error: unknown) => {
      assert.ok(error instanceof AgentError);
      assert.equal(error.message, "Query derivation failed: quota exceeded");
      assert.equal(error.agentType, "query-deriver");
      return true;
    });
  });

  it("throws when the reply holds no JSON", async () => {
    const agent = new QueryDeriverAgent(deps(new FakeExecutor(["I could not think of any queries."])));

    await assert.rejects(agent.derive("T", [], 3), {
      message: "Query derivation failed: query-deriver returned no JSON",
    });
  });

  it("throws when a query has no goals", async () => {
    const reply = JSON.stringify({ queries: [{ query: "q", goals: [] }] });
    const agent = new QueryDeriverAgent(deps(new FakeExecutor([reply])));

    await assert.rejects(agent.derive("T", [], 3), /Query derivation failed: query-deriver output did not match schema/);
  });
});

describe("ReportSynthesizerAgent", () => {
  it("parses JSON surrounded by prose and fills missing lists", async () => {
    const executor = new FakeExecutor([
      'Report follows. {"mainReport": "# Sodium-ion\\nCheaper cells.", "keyLearnings": ["cheap"]} Done.',
    ]);
    const agent = new ReportSynthesizerAgent(deps(executor));

    const report = await agent.synthesize(["finding one"], "sodium-ion");

    assert.deepEqual(report, {
      mainReport: "# Sodium-ion\nCheaper cells.",
      keyLearnings: ["cheap"],
      areasCovered: [],
      areasToExplore: [],
    });
    assert.match(executor.requests[0]?.prompt ?? "", /### Findings 1\n\nfinding one/);
    assert.equal(executor.requests[0]?.profile.model, "sonnet");
  });

  it("numbers findings by position rather than by round", async () => {
    const executor = new FakeExecutor(['{"mainReport": "R"}']);
    await new ReportSynthesizerAgent(deps(executor)).synthesize(["from round one", "from round three"], "T");

    const prompt = executor.requests[0]?.prompt ?? "";
    assert.match(prompt, /### Findings 1\n\nfrom round one\n\n### Findings 2\n\nfrom round three/);
    assert.doesNotMatch(prompt, /### Round/);
  });

  it("classifies a schema mismatch as a validation failure", async () => {
    const agent = new ReportSynthesizerAgent(deps(new FakeExecutor(['{"mainReport": ""}'])));

    const result = await agent.run({ topic: "T", findings: [] });

    assert.equal(result.success, false);
    if (!result.success) {
      assert.equal(result.error.type, "validation");
      assert.equal(result.error.code, "INVALID_OUTPUT");
      assert.equal(result.error.retryable, false);
    }
    assert.equal(result.metadata.costUsd, 0.01);
    assert.equal(result.metadata.agentName, "synthesizer");
  });

  it("reports usage on success", async () => {
    const agent = new ReportSynthesizerAgent(deps(new FakeExecutor(['{"mainReport": "R"}'])));

    const result = await agent.run({ topic: "T", findings: ["f"] });

    assert.equal(result.success, true);
    assert.equal(result.metadata.turns, 1);
    assert.equal(result.metadata.model, "test-model");
  });

  it("throws an AgentError when synthesis fails", async () => {
    const agent = new ReportSynthesizerAgent(deps(new FakeExecutor([{ error: "overloaded" }])));

    await assert.rejects(agent.synthesize([], "T"), {
      name: "AgentError",
      message: "Report synthesis failed: overloaded",
    });
  });

  it("describes itself", () => {
    const agent = new ReportSynthesizerAgent(deps(new FakeExecutor([])));

    assert.deepEqual(agent.getMetadata(), {
      name: "synthesizer",
      version: "1.0.0",
      description: "Writes the final research report from accumulated findings",
      role: "synthesis",
      model: "sonnet",
    });
  });
});
