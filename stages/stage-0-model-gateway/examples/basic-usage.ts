/**
 * Stage 0 basic usage: build a gateway from the environment, send one chat
 * request with a tool declared, print the normalized result.
 *
 * Needs OPENAI_API_KEY or ANTHROPIC_API_KEY (see .env.example).
 */

import {
  buildProviderConfigFromModelMaps,
  createConsoleLogger,
  createModelGateway,
  getDefaultModelForProvider,
  loadGlobalConfig,
  parseLogLevel,
  type ChatResult,
} from "../src/index.js";

function printResult(result: ChatResult) {
  console.log("---------- result ----------");
  console.log(`provider: ${result.provider}  model: ${result.model}`);
  console.log(`content: ${result.content || "(empty)"}`);
  for (const call of result.toolCalls) {
    console.log(`tool call ${call.id}: ${call.name}(${JSON.stringify(call.arguments)})`);
  }
  if (result.usage) {
    console.log(
      `usage: ${result.usage.inputTokens} in / ${result.usage.outputTokens} out`
    );
  }
  if (result.cost) {
    console.log(`cost: ${result.cost.totalCents} cents`);
  }
}

async function main() {
  const env = loadGlobalConfig();
  const provider = env.provider ?? "openai";
  const gateway = createModelGateway({
    providers: buildProviderConfigFromModelMaps(),
    defaultModel: env.defaultModel ?? getDefaultModelForProvider(provider),
    timeoutMs: env.timeoutMs,
    logger: createConsoleLogger(parseLogLevel(env.logLevel)),
  });

  const result = await gateway.chat({
    provider,
    messages: [
      { role: "system", content: "You are a concise assistant." },
      { role: "user", content: "What's the weather like in Lisbon?" },
    ],
    tools: [
      {
        name: "get_weather",
        description: "Get current weather for a location.",
        parameters: {
          type: "object",
          properties: { location: { type: "string" } },
          required: ["location"],
        },
      },
    ],
  });
  printResult(result);
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
