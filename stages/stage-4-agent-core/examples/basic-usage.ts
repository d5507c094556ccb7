/**
 * Function-calling demo: an agent with four toy functions answers a few
 * prompts. Handlers return canned data; only the model calls are real.
 *
 * Needs ANTHROPIC_API_KEY (or set AGENT_PROVIDER=openai and OPENAI_API_KEY).
 */

import { createAgent, type AgentRunResult } from "../src/index.js";

const agent = createAgent({
  name: "ResearchAssistant",
  provider: process.env.AGENT_PROVIDER === "openai" ? "openai" : "anthropic",
});

agent.registerFunction(
  {
    name: "get_current_time",
    description: "Get the current date and time",
    returns: "string",
  },
  () => new Date().toISOString()
);

agent.registerFunction(
  {
    name: "search_info",
    description: "Search for information on a topic",
    parameters: [{ name: "query", type: "string", description: "Search query" }],
    returns: "string",
  },
  (args) =>
    [
      `Results for '${String(args.query)}':`,
      `1. ${String(args.query)} is a popular topic with many resources available.`,
      `2. Recent work on ${String(args.query)} looks promising.`,
    ].join("\n")
);

agent.registerFunction(
  {
    name: "get_weather",
    description: "Get weather information for a location",
    parameters: [
      { name: "location", type: "string", description: "City name" },
      { name: "unit", type: "string", default: "fahrenheit" },
    ],
    returns: "object",
  },
  (args) => ({
    location: args.location,
    temperature: 72,
    unit: args.unit,
    condition: "Sunny",
  })
);

agent.registerFunction(
  {
    name: "calculate",
    description: "Add, subtract, multiply or divide two numbers",
    parameters: [
      { name: "a", type: "number" },
      { name: "b", type: "number" },
      { name: "op", type: "string", description: "one of + - * /" },
    ],
    returns: "number",
  },
  (args) => {
    const a = Number(args.a);
    const b = Number(args.b);
    switch (args.op) {
      case "+":
        return a + b;
      case "-":
        return a - b;
      case "*":
        return a * b;
      case "/":
        if (b === 0) throw new Error("division by zero");
        return a / b;
      default:
        throw new Error(`unsupported operator: ${String(args.op)}`);
    }
  }
);

agent.learn("can search for information online");
agent.learn("can perform calculations");
agent.learn("can get current weather information");
agent.learn("can get the current date and time");

function printRun(prompt: string, result: AgentRunResult) {
  console.log(`\n--- ${prompt} ---`);
  console.log(
    `status: ${result.status}  iterations: ${result.iterations}  calls: ${result.functionCalls}`
  );
  console.log(result.reply);
}

async function main() {
  const prompts = [
    "What time is it right now?",
    "What's the weather like in San Francisco?",
    "What is 15 * 7?",
    "I need the current time and the weather in New York",
  ];
  for (const prompt of prompts) {
    printRun(prompt, await agent.run(prompt));
  }
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
