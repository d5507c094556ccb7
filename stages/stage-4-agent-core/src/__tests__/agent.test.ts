import { describe, it, expect, vi, beforeEach } from "vitest";

import { ConfigurationError } from "../../../../config/index.js";
import { createSilentLogger } from "../../../stage-0-model-gateway/src/logger.js";
import { ProviderCommunicationError } from "../../../stage-0-model-gateway/src/providers/types.js";
import type { Logger } from "../../../stage-0-model-gateway/src/types.js";
import type { ConversationTurn } from "../../../stage-1-context-engine/src/types.js";
import { MalformedDecisionError } from "../../../stage-2-output-control/src/errors.js";
import type {
  CallProposal,
  Decision,
  DecisionRequest,
  ProviderAdapter,
} from "../../../stage-2-output-control/src/types.js";
import { DuplicateRegistrationError } from "../../../stage-3-tool-system/src/errors.js";
import { createAgent } from "../agent.js";
import { InvalidRequestError, RequestCancelledError } from "../errors.js";
import type { AgentOptions } from "../types.js";

type Step = Decision | Error | ((request: DecisionRequest) => Decision);

function scripted(...steps: Step[]) {
  const requests: DecisionRequest[] = [];
  const adapter: ProviderAdapter = {
    async decide(request) {
      requests.push(request);
      const step = steps[requests.length - 1];
      if (step === undefined) {
        throw new Error(`no scripted step for round-trip ${requests.length}`);
      }
      if (step instanceof Error) {
        throw step;
      }
      return {
        decision: typeof step === "function" ? step(request) : step,
        usage: { inputTokens: 10, outputTokens: 5, totalTokens: 15 },
        cost: { inputCents: 0.01, outputCents: 0.02, totalCents: 0.03, currency: "USD" },
      };
    },
  };
  return { adapter, requests };
}

function answer(text: string): Decision {
  return { kind: "final_answer", text };
}

function calls(...proposals: CallProposal[]): Decision {
  return { kind: "function_calls", calls: proposals };
}

function agentWith(adapter: ProviderAdapter, options: AgentOptions = {}) {
  return createAgent({ adapter, logger: createSilentLogger(), ...options });
}

const weatherDescriptor = {
  name: "get_weather",
  description: "Get weather information for a location",
  parameters: [{ name: "location", type: "string" as const }],
  returns: "object",
};

beforeEach(() => {
  vi.stubEnv("AGENT_PROVIDER", "");
  vi.stubEnv("AGENT_MAX_ITERATIONS", "");
  vi.stubEnv("AGENT_TIMEOUT_MS", "");
  vi.stubEnv("DEFAULT_MODEL", "");
});

describe("createAgent", () => {
  it("applies defaults", () => {
    const agent = agentWith(scripted().adapter);

    expect(agent.name).toBe("Assistant");
    expect(agent.provider).toBe("openai");
    expect(agent.model).toBe("gpt-3.5-turbo");
    expect(agent.maxIterations).toBe(5);
  });

  it("picks the default model of the chosen provider", () => {
    const agent = agentWith(scripted().adapter, { provider: "anthropic" });
    expect(agent.model).toBe("claude-3-haiku-20240307");
  });

  it("rejects invalid limits at construction", () => {
    expect(() => agentWith(scripted().adapter, { maxIterations: 0 })).toThrow(
      ConfigurationError
    );
    expect(() => agentWith(scripted().adapter, { timeoutMs: -1 })).toThrow(
      "timeoutMs must be a positive integer, got -1."
    );
  });

  it("rejects an unknown provider from the environment", () => {
    vi.stubEnv("AGENT_PROVIDER", "gemini");
    expect(() => agentWith(scripted().adapter)).toThrow(ConfigurationError);
  });

  it("reads the iteration cap from the environment", () => {
    vi.stubEnv("AGENT_MAX_ITERATIONS", "3");
    expect(agentWith(scripted().adapter).maxIterations).toBe(3);
  });

  it("learns capabilities and lists functions", () => {
    const agent = agentWith(scripted().adapter, { capabilities: ["can search"] });

    expect(agent.learn("  can get weather ")).toBe(true);
    expect(agent.learn("   ")).toBe(false);
    agent.registerFunction(weatherDescriptor, () => "sunny");

    expect(agent.capabilities()).toEqual(["can search", "can get weather"]);
    expect(agent.functions().map((f) => f.name)).toEqual(["get_weather"]);
    expect(agent.unregisterFunction("get_weather")).toBe(true);
    expect(agent.functions()).toEqual([]);
  });

  it("applies the duplicate policy", () => {
    const agent = agentWith(scripted().adapter, { onDuplicate: "reject" });
    agent.registerFunction(weatherDescriptor, () => "sunny");

    expect(() => agent.registerFunction(weatherDescriptor, () => "rain")).toThrow(
      DuplicateRegistrationError
    );
  });
});

describe("respond", () => {
  it("returns a direct answer in one round-trip", async () => {
    const { adapter, requests } = scripted(answer("Hello! How can I help?"));
    const agent = agentWith(adapter);

    const result = await agent.run("Hi there");

    expect(result.status).toBe("completed");
    expect(result.reply).toBe("Hello! How can I help?");
    expect(result.iterations).toBe(1);
    expect(result.functionCalls).toBe(0);
    expect(result.turns).toEqual([
      { kind: "user_message", text: "Hi there" },
      { kind: "final_answer", text: "Hello! How can I help?" },
    ]);
    expect(requests[0].functions).toEqual([]);
    expect(requests[0].system).toBe(
      "You are Assistant, an AI assistant. No specific capabilities have been declared.\n\nNo functions are available. Answer the user directly."
    );
  });

  it("calls a function and answers from its result", async () => {
    const { adapter, requests } = scripted(
      calls({ callId: "c1", name: "get_weather", arguments: { location: "San Francisco" } }),
      answer("It is 72 and sunny in San Francisco.")
    );
    const agent = agentWith(adapter, { name: "ResearchAssistant" });
    agent.learn("can get current weather information");
    const handler = vi.fn((args: { location?: unknown }) => ({
      location: args.location,
      temperature: 72,
      condition: "Sunny",
    }));
    agent.registerFunction(weatherDescriptor, handler);

    const reply = await agent.respond("What's the weather like in San Francisco?");

    expect(reply).toBe("It is 72 and sunny in San Francisco.");
    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler.mock.calls[0][0]).toEqual({ location: "San Francisco" });
    expect(requests[0].system).toContain(
      "You are ResearchAssistant, an AI assistant with the following capabilities:\n\n- can get current weather information"
    );
    expect(requests[0].functions.map((f) => f.name)).toEqual(["get_weather"]);
    expect(requests[1].turns).toEqual([
      { kind: "user_message", text: "What's the weather like in San Francisco?" },
      {
        kind: "function_call",
        callId: "c1",
        round: 1,
        name: "get_weather",
        arguments: { location: "San Francisco" },
      },
      {
        kind: "function_result",
        callId: "c1",
        round: 1,
        name: "get_weather",
        ok: true,
        value: { location: "San Francisco", temperature: 72, condition: "Sunny" },
        content: '{"location":"San Francisco","temperature":72,"condition":"Sunny"}',
      },
    ]);
  });

  it("runs the calls of one decision one at a time, in order", async () => {
    const { adapter } = scripted(
      calls(
        { callId: "c1", name: "get_current_time", arguments: {} },
        { callId: "c2", name: "get_weather", arguments: { location: "New York" } }
      ),
      answer("It is noon and cloudy in New York.")
    );
    const agent = agentWith(adapter);
    const log: string[] = [];
    agent.registerFunction({ name: "get_current_time", description: "Time" }, async () => {
      log.push("time:start");
      await new Promise((resolve) => setTimeout(resolve, 5));
      log.push("time:end");
      return "12:00";
    });
    agent.registerFunction(weatherDescriptor, () => {
      log.push("weather");
      return "cloudy";
    });

    const result = await agent.run("Time and weather in New York?");

    expect(log).toEqual(["time:start", "time:end", "weather"]);
    expect(result.turns.map((t) => t.kind)).toEqual([
      "user_message",
      "function_call",
      "function_result",
      "function_call",
      "function_result",
      "final_answer",
    ]);
    expect(result.functionCalls).toBe(2);
  });

  it("coerces arguments before the handler sees them", async () => {
    const { adapter } = scripted(
      calls({ callId: "c1", name: "repeat", arguments: { text: "ab", times: "3" } }),
      answer("ababab")
    );
    const agent = agentWith(adapter);
    const handler = vi.fn((args: { text?: unknown; times?: unknown }) =>
      String(args.text).repeat(Number(args.times))
    );
    agent.registerFunction(
      {
        name: "repeat",
        description: "Repeat text",
        parameters: [
          { name: "text", type: "string" },
          { name: "times", type: "integer" },
        ],
      },
      handler
    );

    await agent.respond("Repeat ab three times");

    expect(handler.mock.calls[0][0]).toEqual({ text: "ab", times: 3 });
  });

  it("feeds a missing argument back without calling the handler", async () => {
    const { adapter, requests } = scripted(
      calls({ callId: "c1", name: "get_weather", arguments: {} }),
      answer("Which city do you mean?")
    );
    const agent = agentWith(adapter);
    const handler = vi.fn();
    agent.registerFunction(weatherDescriptor, handler);

    const reply = await agent.respond("What's the weather?");

    expect(reply).toBe("Which city do you mean?");
    expect(handler).not.toHaveBeenCalled();
    expect(requests[1].turns[2]).toEqual({
      kind: "function_result",
      callId: "c1",
      round: 1,
      name: "get_weather",
      ok: false,
      error: {
        type: "missing_argument",
        message: 'Missing required argument "location" for get_weather.',
        parameter: "location",
      },
      content: 'Error: Missing required argument "location" for get_weather.',
    });
  });

  it("feeds a type mismatch back without calling the handler", async () => {
    const { adapter, requests } = scripted(
      calls({ callId: "c1", name: "add", arguments: { a: "abc", b: 2 } }),
      answer("I need numbers.")
    );
    const agent = agentWith(adapter);
    const handler = vi.fn();
    agent.registerFunction(
      {
        name: "add",
        description: "Add two numbers",
        parameters: [
          { name: "a", type: "number" },
          { name: "b", type: "number" },
        ],
      },
      handler
    );

    await agent.respond("Add abc and 2");

    expect(handler).not.toHaveBeenCalled();
    expect(requests[1].turns[2]).toMatchObject({
      ok: false,
      error: { type: "type_coercion", parameter: "a", expected: "number", received: "string" },
      content: 'Error: Argument "a" for add must be number, got string.',
    });
  });

  it("answers an undeclared function with function_not_available and continues", async () => {
    const unknown = new MalformedDecisionError({
      reason: "unknown_function",
      message: "Backend proposed undeclared function(s): launch_rocket",
      calls: [{ callId: "u1", name: "launch_rocket", arguments: {} }],
      unknownNames: ["launch_rocket"],
    });
    const { adapter, requests } = scripted(unknown, answer("I cannot launch rockets."));
    const agent = agentWith(adapter);

    const result = await agent.run("Launch a rocket");

    expect(result.status).toBe("completed");
    expect(result.reply).toBe("I cannot launch rockets.");
    expect(requests[1].turns[2]).toMatchObject({
      kind: "function_result",
      callId: "u1",
      ok: false,
      error: { type: "function_not_available", message: "Function not available: launch_rocket" },
      content: "Error: Function not available: launch_rocket",
    });
  });

  it("reports a failing handler to the model", async () => {
    const { adapter, requests } = scripted(
      calls({ callId: "c1", name: "get_weather", arguments: { location: "Atlantis" } }),
      answer("I could not find that place.")
    );
    const agent = agentWith(adapter);
    agent.registerFunction(weatherDescriptor, () => {
      throw new Error("unknown location");
    });

    await agent.respond("Weather in Atlantis?");

    expect(requests[1].turns[2]).toMatchObject({
      ok: false,
      error: { type: "execution_failed", message: "get_weather failed: unknown location" },
      content: "Error: get_weather failed: unknown location",
    });
  });

  it("keeps running the rest of a decision after one call fails", async () => {
    const { adapter, requests } = scripted(
      calls(
        { callId: "c1", name: "get_weather", arguments: { location: "Atlantis" } },
        { callId: "c2", name: "get_weather", arguments: { location: "Paris" } }
      ),
      answer("Paris is sunny; Atlantis is unknown.")
    );
    const agent = agentWith(adapter);
    const handler = vi.fn((args: { [key: string]: unknown }) => {
      if (args.location === "Atlantis") {
        throw new Error("unknown location");
      }
      return "sunny";
    });
    agent.registerFunction(weatherDescriptor, handler);

    const result = await agent.run("Weather in Atlantis and Paris?");

    expect(result.reply).toBe("Paris is sunny; Atlantis is unknown.");
    expect(handler).toHaveBeenCalledTimes(2);
    expect(handler.mock.calls[1][0]).toEqual({ location: "Paris" });
    const results = result.turns.filter((turn) => turn.kind === "function_result");
    expect(results).toMatchObject([
      { callId: "c1", ok: false, content: "Error: get_weather failed: unknown location" },
      { callId: "c2", ok: true, content: "sunny" },
    ]);
    expect(requests[1].turns.map((turn) => turn.kind)).toEqual([
      "user_message",
      "function_call",
      "function_result",
      "function_call",
      "function_result",
    ]);
    expect(requests[1].turns.slice(1)).toMatchObject([
      { callId: "c1" },
      { callId: "c1", ok: false },
      { callId: "c2" },
      { callId: "c2", ok: true },
    ]);
  });

  it("stops at the cap with a summary of the latest results", async () => {
    const loopForever = (request: DecisionRequest) =>
      calls({
        callId: `c${request.turns.length}`,
        name: "get_weather",
        arguments: { location: "Paris" },
      });
    const { adapter, requests } = scripted(loopForever, loopForever, loopForever);
    const agent = agentWith(adapter, { maxIterations: 2 });
    agent.registerFunction(weatherDescriptor, () => "sunny");

    const result = await agent.run("Weather in Paris?");

    expect(requests).toHaveLength(2);
    expect(result.status).toBe("max_iterations_exceeded");
    expect(result.iterations).toBe(2);
    expect(result.reply).toBe(
      "I could not complete the request within 2 model round-trips. Latest function results:\n- get_weather: sunny\n- get_weather: sunny"
    );
    expect(result.partialResults.map((r) => r.callId)).toEqual(["c1", "c3"]);
    expect(result.turns.at(-1)?.kind).toBe("function_result");
  });

  it("honours a per-call iteration override", async () => {
    const loopForever = () =>
      calls({ callId: "c1", name: "get_weather", arguments: { location: "Paris" } });
    const { adapter, requests } = scripted(loopForever, loopForever);
    const agent = agentWith(adapter, { maxIterations: 5 });
    agent.registerFunction(weatherDescriptor, () => "sunny");

    const reply = await agent.respond("Weather?", { maxIterations: 1 });

    expect(requests).toHaveLength(1);
    expect(reply).toBe(
      "I could not complete the request within 1 model round-trip. Latest function results:\n- get_weather: sunny"
    );
  });

  it("summarizes an exhausted run with no results", async () => {
    const unknown = () =>
      new MalformedDecisionError({
        reason: "unknown_function",
        message: "undeclared",
        calls: [],
        unknownNames: [],
      });
    const { adapter } = scripted(unknown());
    const agent = agentWith(adapter, { maxIterations: 1 });

    await expect(agent.respond("Anything?")).resolves.toBe(
      "I could not complete the request within 1 model round-trip. No function produced a result."
    );
  });

  it("asks once more for an answer when configured", async () => {
    const { adapter, requests } = scripted(
      calls({ callId: "c1", name: "get_weather", arguments: { location: "Paris" } }),
      answer("Based on what I found, it is sunny in Paris.")
    );
    const agent = agentWith(adapter, { maxIterations: 1, finalAnswerOnExhaustion: true });
    agent.registerFunction(weatherDescriptor, () => "sunny");

    const result = await agent.run("Weather in Paris?");

    expect(result.status).toBe("max_iterations_exceeded");
    expect(result.reply).toBe("Based on what I found, it is sunny in Paris.");
    expect(result.iterations).toBe(2);
    expect(requests[1].system).toContain("Do not call any more functions.");
  });

  it("falls back to the summary when the extra round-trip proposes calls", async () => {
    const again = calls({ callId: "c1", name: "get_weather", arguments: { location: "Paris" } });
    const { adapter } = scripted(again, again);
    const agent = agentWith(adapter, { maxIterations: 1, finalAnswerOnExhaustion: true });
    agent.registerFunction(weatherDescriptor, () => "sunny");

    await expect(agent.respond("Weather in Paris?")).resolves.toBe(
      "I could not complete the request within 1 model round-trip. Latest function results:\n- get_weather: sunny"
    );
  });

  it("sums usage and cost over every round-trip", async () => {
    const { adapter } = scripted(
      calls({ callId: "c1", name: "get_weather", arguments: { location: "Oslo" } }),
      answer("Cold.")
    );
    const agent = agentWith(adapter);
    agent.registerFunction(weatherDescriptor, () => "cold");

    const result = await agent.run("Weather in Oslo?");

    expect(result.usage).toEqual({ inputTokens: 20, outputTokens: 10, totalTokens: 30 });
    expect(result.cost).toEqual({
      inputCents: 0.02,
      outputCents: 0.04,
      totalCents: 0.06,
      currency: "USD",
    });
  });

  it("shows functions registered mid-run on the next round-trip", async () => {
    const { adapter, requests } = scripted(
      calls({ callId: "c1", name: "enable_clock", arguments: {} }),
      answer("Clock enabled.")
    );
    const agent = agentWith(adapter);
    agent.registerFunction({ name: "enable_clock", description: "Enable the clock" }, () => {
      agent.registerFunction({ name: "get_current_time", description: "Time" }, () => "noon");
      return "ok";
    });

    await agent.respond("Turn on the clock");

    expect(requests[0].functions.map((f) => f.name)).toEqual(["enable_clock"]);
    expect(requests[1].functions.map((f) => f.name)).toEqual([
      "enable_clock",
      "get_current_time",
    ]);
  });

  it("reports each turn to the observer", async () => {
    const { adapter } = scripted(
      calls({ callId: "c1", name: "get_weather", arguments: { location: "Oslo" } }),
      answer("Cold.")
    );
    const agent = agentWith(adapter);
    agent.registerFunction(weatherDescriptor, () => "cold");
    const seen: Array<[ConversationTurn["kind"], string]> = [];

    const result = await agent.run("Weather in Oslo?", {
      onTurn: (turn, runId) => seen.push([turn.kind, runId]),
    });

    expect(seen.map(([kind]) => kind)).toEqual([
      "user_message",
      "function_call",
      "function_result",
      "final_answer",
    ]);
    expect(new Set(seen.map(([, runId]) => runId))).toEqual(new Set([result.runId]));
  });

  it("keeps concurrent requests isolated", async () => {
    const echo = (request: DecisionRequest) => {
      const first = request.turns[0];
      return answer(first.kind === "user_message" ? `echo: ${first.text}` : "?");
    };
    const { adapter } = scripted(echo, echo);
    const agent = agentWith(adapter);

    const [a, b] = await Promise.all([agent.run("first"), agent.run("second")]);

    expect(a.reply).toBe("echo: first");
    expect(b.reply).toBe("echo: second");
    expect(a.turns).toHaveLength(2);
    expect(b.turns).toHaveLength(2);
    expect(a.runId).not.toBe(b.runId);
  });

  it("logs the run lifecycle through the configured logger", async () => {
    const logger: Logger = {
      logRequest: vi.fn(),
      logResponse: vi.fn(),
      logError: vi.fn(),
      logEvent: vi.fn(),
    };
    const { adapter } = scripted(answer("Hi."));
    const agent = createAgent({ adapter, logger });

    const result = await agent.run("Hello");

    expect(logger.logEvent).toHaveBeenCalledWith(
      expect.objectContaining({ level: "info", event: "run_started", runId: result.runId })
    );
    expect(logger.logEvent).toHaveBeenCalledWith(
      expect.objectContaining({
        level: "info",
        event: "run_finished",
        runId: result.runId,
        details: expect.objectContaining({ status: "completed", iterations: 1 }),
      })
    );
  });

  it("sets the default console logger's level from the logLevel option", async () => {
    vi.stubEnv("LOG_LEVEL", "info");
    const out = vi.spyOn(console, "log").mockImplementation(() => {});
    const err = vi.spyOn(console, "error").mockImplementation(() => {});

    const quiet = createAgent({ adapter: scripted(answer("Hi.")).adapter, logLevel: "silent" });
    await quiet.run("Hello");
    expect(out).not.toHaveBeenCalled();
    expect(err).not.toHaveBeenCalled();

    createAgent({ adapter: scripted().adapter, name: "Verbose", logLevel: "debug" });
    expect(out).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(out.mock.calls[0][0]))).toMatchObject({
      level: "debug",
      event: "agent_created",
      details: { name: "Verbose", provider: "openai", model: "gpt-3.5-turbo", maxIterations: 5 },
    });
  });

  it("uses UUID-based run ids", async () => {
    const agent = agentWith(scripted(answer("Hi.")).adapter);
    const result = await agent.run("Hello");
    expect(result.runId).toMatch(/^run_[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
  });
});

describe("respond failures", () => {
  it("rejects an empty request before any round-trip", async () => {
    const { adapter, requests } = scripted(answer("unused"));
    const agent = agentWith(adapter);

    await expect(agent.respond("   ")).rejects.toBeInstanceOf(InvalidRequestError);
    expect(requests).toHaveLength(0);
  });

  it("propagates a communication failure", async () => {
    const failure = new ProviderCommunicationError({
      provider: "openai",
      message: "Service unavailable",
      status: 503,
    });
    const { adapter } = scripted(failure);
    const agent = agentWith(adapter);

    await expect(agent.respond("Hello")).rejects.toBe(failure);
  });

  it("propagates an unusable decision", async () => {
    const empty = new MalformedDecisionError({
      reason: "empty_response",
      message: "Backend returned neither text nor a function call.",
    });
    const { adapter } = scripted(empty);
    const agent = agentWith(adapter);

    await expect(agent.respond("Hello")).rejects.toBe(empty);
  });

  it("does not start when the signal is already aborted", async () => {
    const { adapter, requests } = scripted(answer("unused"));
    const agent = agentWith(adapter);
    const controller = new AbortController();
    controller.abort();

    await expect(
      agent.respond("Hello", { abortSignal: controller.signal })
    ).rejects.toBeInstanceOf(RequestCancelledError);
    expect(requests).toHaveLength(0);
  });

  it("stops before the next call once cancelled", async () => {
    const controller = new AbortController();
    const { adapter, requests } = scripted(
      calls(
        { callId: "c1", name: "cancel_me", arguments: {} },
        { callId: "c2", name: "get_weather", arguments: { location: "Oslo" } }
      ),
      answer("unused")
    );
    const agent = agentWith(adapter);
    const weather = vi.fn();
    agent.registerFunction({ name: "cancel_me", description: "Cancels" }, () => {
      controller.abort();
      return "cancelled";
    });
    agent.registerFunction(weatherDescriptor, weather);

    await expect(
      agent.respond("Hello", { abortSignal: controller.signal })
    ).rejects.toBeInstanceOf(RequestCancelledError);
    expect(weather).not.toHaveBeenCalled();
    expect(requests).toHaveLength(1);
    expect(agent.functions()).toHaveLength(2);
  });
});

describe("scenarios", () => {
  it("answers weather and arithmetic over two round-trips of calls", async () => {
    const { adapter, requests } = scripted(
      calls({ callId: "w1", name: "get_weather", arguments: { location: "London" } }),
      calls({ callId: "k1", name: "calculate", arguments: { expression: "15*7" } }),
      answer("London is 15 degrees and rainy, and 15*7 is 105.")
    );
    const agent = agentWith(adapter);
    agent.learn("can check weather");
    agent.learn("can do arithmetic");
    agent.registerFunction(weatherDescriptor, (args) => ({
      location: args.location,
      temperature: 15,
      condition: "Rainy",
    }));
    agent.registerFunction(
      {
        name: "calculate",
        description: "Multiply two numbers written as a*b",
        parameters: [{ name: "expression", type: "string" }],
        returns: "number",
      },
      (args) => {
        const [a, b] = String(args.expression).split("*").map(Number);
        return a * b;
      }
    );

    const result = await agent.run("Weather in London and 15*7?");

    expect(result.reply).toBe("London is 15 degrees and rainy, and 15*7 is 105.");
    expect(result.iterations).toBe(3);
    expect(result.partialResults.map((r) => [r.name, r.content])).toEqual([
      ["get_weather", '{"location":"London","temperature":15,"condition":"Rainy"}'],
      ["calculate", "105"],
    ]);
    expect(requests[2].turns.map((t) => t.kind)).toEqual([
      "user_message",
      "function_call",
      "function_result",
      "function_call",
      "function_result",
    ]);
  });

  it("recovers when the model asks for a function that is not registered", async () => {
    const { adapter } = scripted(
      new MalformedDecisionError({
        reason: "unknown_function",
        message: "Backend proposed undeclared function(s): get_current_time",
        calls: [{ callId: "t1", name: "get_current_time", arguments: {} }],
        unknownNames: ["get_current_time"],
      }),
      answer("Sorry, I cannot tell the time.")
    );
    const agent = agentWith(adapter);

    const result = await agent.run("What time is it?");

    expect(result.status).toBe("completed");
    expect(result.reply).toBe("Sorry, I cannot tell the time.");
    expect(result.turns[2]).toMatchObject({
      kind: "function_result",
      ok: false,
      error: { type: "function_not_available" },
    });
  });

  it("feeds back an omitted required argument and keeps going", async () => {
    const { adapter } = scripted(
      calls({ callId: "c1", name: "get_weather", arguments: {} }),
      calls({ callId: "c2", name: "get_weather", arguments: { location: "Paris" } }),
      answer("Paris is sunny.")
    );
    const agent = agentWith(adapter);
    const handler = vi.fn(() => "sunny");
    agent.registerFunction(weatherDescriptor, handler);

    const result = await agent.run("Weather?");

    expect(handler).toHaveBeenCalledTimes(1);
    expect(result.reply).toBe("Paris is sunny.");
    expect(result.partialResults.map((r) => r.ok)).toEqual([false, true]);
  });
});
