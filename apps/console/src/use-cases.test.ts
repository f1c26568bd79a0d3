import { describe, it, expect } from "vitest";
import type { ConversationId } from "@agentdeck/types";
import { AgentServiceError } from "@agentdeck/core";
import { FALLBACK_RESPONSE } from "@agentdeck/runtime";
import { createHarness } from "./testing.js";
import { runAll, runUseCase, resolveUseCase, type UseCase } from "./use-case.js";
import { runMenu } from "./menu.js";
import { USE_CASES } from "./use-cases/index.js";
import { basicConversation } from "./use-cases/basic-conversation.js";
import { functionCalling } from "./use-cases/function-calling.js";
import { structuredOutput } from "./use-cases/structured-output.js";
import { errorHandling } from "./use-cases/error-handling.js";
import { fileSearch } from "./use-cases/file-search.js";
import { imageVision, SAMPLE_IMAGES } from "./use-cases/image-vision.js";
import { streaming, STREAMING_QUESTIONS } from "./use-cases/streaming.js";
import { eventDriven, SAMPLE_EVENTS } from "./use-cases/event-driven.js";
import { multiAgent } from "./use-cases/multi-agent.js";
import { conversationMemory } from "./use-cases/conversation-memory.js";
import { azureSearchRag } from "./use-cases/azure-search-rag.js";

const NOTHING_LIVE = { agents: 0, conversations: 0, files: 0, vectorStores: 0 };

describe("use cases against the mock service", () => {
  it.each(USE_CASES.filter((useCase) => !useCase.interactive).map((useCase): [string, UseCase] => [useCase.id, useCase]))(
    "%s completes and releases everything it created",
    async (_id, useCase) => {
      const { ctx, service } = createHarness();
      expect(await runUseCase(ctx, useCase)).toBe(true);
      expect(service.live()).toEqual(NOTHING_LIVE);
    }
  );

  it("basic conversation keeps context across turns", async () => {
    const { ctx, out } = createHarness();
    await runUseCase(ctx, basicConversation);

    expect(out.lines).toContain("[Agent]: Nice to meet you, Priya!");
    expect(out.lines).toContain('[Agent]: You said: "Give me two tips for writing clear commit messages."');
    expect(out.lines).toContain("[Agent]: Your name is Priya.");
  });

  it("function calling prints each dispatched tool call", async () => {
    const { ctx, out } = createHarness();
    await runUseCase(ctx, functionCalling);

    const toolLines = out.lines.filter((line) => line.startsWith("  ⚙ "));
    expect(toolLines).toHaveLength(4);
    expect(toolLines[0]?.startsWith('  ⚙ get_weather({"city":"Seattle"}) → {"City":"Seattle"')).toBe(true);
    expect(toolLines[1]?.startsWith('  ⚙ get_stock_price({"symbol":"MSFT"}) → ')).toBe(true);
    expect(toolLines[2]?.startsWith('  ⚙ get_weather({"city":"London"})')).toBe(true);
    expect(toolLines[3]?.startsWith('  ⚙ get_weather({"city":"Tokyo"})')).toBe(true);
    expect(
      out.lines.some((line) => line.startsWith("[Agent]: Here is what I found:\n- get_weather: City: Seattle, "))
    ).toBe(true);
  });

  it("structured output is pretty-printed", async () => {
    const { ctx, out } = createHarness();
    await runUseCase(ctx, structuredOutput);

    const expected = { sentiment: "positive", score: 0, pros: ["sample"], cons: ["sample"], wouldRecommend: false };
    expect(out.lines).toContain(`[Agent]: ${JSON.stringify(expected, null, 2)}`);
  });

  it("event-driven triage uses one conversation per event", async () => {
    const { ctx, service, out } = createHarness();
    await runUseCase(ctx, eventDriven);

    expect(service.callCount("createConversation")).toBe(SAMPLE_EVENTS.length);
    expect(service.callCount("deleteConversation")).toBe(SAMPLE_EVENTS.length);
    expect(out.lines).toContain("📨 evt-103 from ticket");
  });

  it("multi-agent pipeline runs two agents in separate conversations", async () => {
    const { ctx, service, out } = createHarness();
    await runUseCase(ctx, multiAgent);

    expect(service.callCount("createAgent")).toBe(2);
    expect(service.callCount("createConversation")).toBe(2);
    expect(out.lines).toContain(
      '[You]: Write a short blog paragraph from these notes:\nYou said: "Research notes on why small teams adopt feature flags."'
    );
  });

  it("file search waits for indexing before creating the agent", async () => {
    const { ctx, service, out, slept } = createHarness();
    await runUseCase(ctx, fileSearch);

    expect(service.callCount("uploadFile")).toBe(2);
    expect(service.callCount("getVectorStore")).toBe(1);
    expect(slept[0]).toBe(1000);
    expect(out.lines).toContain("📚 Vector store company-policies ready (2 files indexed)");
    expect(out.lines).toContain(
      '[Agent]: The file_search tool runs inside the live service and is not available offline. You asked: "How often are laptops replaced?"'
    );
  });

  it("sends every sample image alongside its question", async () => {
    const { ctx, out, input } = createHarness();
    expect(await runUseCase(ctx, imageVision)).toBe(true);

    for (const { question, url } of SAMPLE_IMAGES) {
      expect(out.lines).toContain(`[You]: ${question} [image: ${url}]`);
      expect(out.lines).toContain(
        `[Agent]: I received an image (${url}) with the question "${question}". Image analysis needs the live service.`
      );
    }
    expect(out.lines).toContain("Skipping custom image analysis.");
    expect(input.prompts).toEqual(["Paste an image URL (or press Enter to skip): "]);
  });

  it("asks about an image URL the user pastes", async () => {
    const { ctx, service, out, input } = createHarness();
    input.feed(" https://example.test/cat.png ", "What animal is this?");

    await runUseCase(ctx, imageVision);

    expect(out.lines).toContain("[You]: What animal is this? [image: https://example.test/cat.png]");
    expect(out.lines).toContain(
      '[Agent]: I received an image (https://example.test/cat.png) with the question "What animal is this?". Image analysis needs the live service.'
    );
    expect(out.lines).not.toContain("Skipping custom image analysis.");
    expect(service.live()).toEqual(NOTHING_LIVE);
  });

  it("skips a pasted value that is not a web URL", async () => {
    const { ctx, out, input } = createHarness();
    input.feed("cat.png");

    await runUseCase(ctx, imageVision);

    expect(out.lines).toContain("Skipping custom image analysis.");
    expect(input.prompts).toHaveLength(1);
  });

  it("streaming prints each reply fragment as it arrives", async () => {
    const { ctx, service, out } = createHarness();
    expect(await runUseCase(ctx, streaming)).toBe(true);

    const [first, second] = STREAMING_QUESTIONS;
    expect(out.lines).toContain(`[Agent]: You said: "${first}"`);
    expect(out.lines).toContain(`[Agent]: You said: "${second}"`);
    expect(out.writes.slice(0, 4)).toEqual(["[Agent]: ", "You ", "said: ", '"Tell ']);
    expect(service.callCount("createRunStream")).toBe(2);
    expect(service.callCount("getRun")).toBe(0);
  });
});

describe("error handling use case", () => {
  it("retries agent creation, explains tool errors and falls back on timeouts", async () => {
    const { ctx, service, out } = createHarness();
    service.failNext("createAgent");

    expect(await runUseCase(ctx, errorHandling)).toBe(true);

    expect(out.lines).toContain(
      "  ↻ createAgent attempt 1/3 failed (createAgent: Injected failure); retrying in 5ms"
    );
    expect(out.lines).toContain(
      `  ⚠ get_database_record({"recordId":"EMP-999","table":"employees"}) failed: Record 'EMP-999' not found in table 'employees'`
    );
    expect(out.lines).toContain(
      "[Agent]: Here is what I found:\n- get_database_record failed: Record 'EMP-999' not found in table 'employees'"
    );
    expect(out.lines).toContain(
      "  ↻ executeTurn attempt 1/2 failed (Turn timed out after 1ms); retrying in 5ms"
    );
    expect(out.lines).toContain(`[Agent]: ${FALLBACK_RESPONSE} (fallback after 2 attempts)`);
    expect(service.callCount("cancelRun")).toBe(2);
    expect(service.live()).toEqual(NOTHING_LIVE);
  });
});

describe("runUseCase", () => {
  it("reports a failing use case and still releases its resources", async () => {
    const { ctx, service, out } = createHarness();
    service.failNext("createConversation", {
      error: new AgentServiceError("HTTP_ERROR", "createConversation", "HTTP 400: bad request", { status: 400 }),
    });

    expect(await runUseCase(ctx, basicConversation)).toBe(false);
    expect(out.lines).toContain("❌ Basic Conversation failed: createConversation: HTTP 400: bad request");
    expect(service.live()).toEqual(NOTHING_LIVE);
  });

  it("runAll skips interactive use cases and counts successes", async () => {
    const { ctx, service, out } = createHarness();
    const batch = USE_CASES.filter((useCase) => !useCase.interactive);

    expect(await runAll(ctx, USE_CASES)).toBe(batch.length);
    expect(out.lines.at(-1)).toBe(`Completed ${batch.length} of ${batch.length} use cases.`);
    expect(service.live()).toEqual(NOTHING_LIVE);
  });

  it("resolves menu choices by number or id", () => {
    expect(resolveUseCase(USE_CASES, "1")).toBe(basicConversation);
    expect(resolveUseCase(USE_CASES, " Image-Vision ")).toBe(imageVision);
    expect(resolveUseCase(USE_CASES, "0")).toBeUndefined();
    expect(resolveUseCase(USE_CASES, "horoscope")).toBeUndefined();
  });
});

describe("menu", () => {
  it("runs a chosen use case, rejects unknown choices and quits", async () => {
    const { ctx, out, input } = createHarness();
    input.feed("9", "nope", "q");

    await runMenu(ctx, USE_CASES);

    expect(out.lines.some((line) => line.startsWith("── Streaming Responses "))).toBe(true);
    expect(out.lines).toContain("Unknown choice 'nope'.");
    expect(out.lines.at(-1)).toBe("Goodbye!");
  });

  it("ends when input runs out", async () => {
    const { ctx, out } = createHarness();
    await runMenu(ctx, USE_CASES);
    expect(out.lines.at(-1)).toBe("Goodbye!");
  });
});

describe("interactive use cases", () => {
  it("saves a conversation and resumes it with its history", async () => {
    const { ctx, service, store, out, input } = createHarness();

    input.feed("My name is Ada", "history", "exit", "intro");
    await runUseCase(ctx, conversationMemory);

    expect(out.lines).toContain("Last 2 of 2 messages:");
    expect(out.lines).toContain("[You]: My name is Ada");
    expect(out.lines).toContain('💾 Saved as "intro"');
    expect(service.live()).toEqual({ ...NOTHING_LIVE, conversations: 1 });
    const [saved] = await store.list();
    expect(saved?.topic).toBe("intro");
    expect(saved?.agentName).toBe("MemoryAssistant");

    out.lines.length = 0;
    input.feed("1", "What is my name?", "exit");
    await runUseCase(ctx, conversationMemory);

    expect(out.lines).toContain('Resuming "intro"');
    expect(out.lines).toContain("[Agent]: Nice to meet you, Ada!");
    expect(out.lines).toContain("[Agent]: Your name is Ada.");
    expect(service.live()).toEqual({ ...NOTHING_LIVE, conversations: 1 });
  });

  it("discards an unsaved conversation", async () => {
    const { ctx, service, store, input } = createHarness();
    input.feed("hello", "exit", "");

    await runUseCase(ctx, conversationMemory);

    expect(await store.list()).toEqual([]);
    expect(service.live()).toEqual(NOTHING_LIVE);
  });

  it("deletes the conversation when a turn fails", async () => {
    const { ctx, service, input } = createHarness();
    service.failNext("createRun");
    input.feed("hello", "exit");

    expect(await runUseCase(ctx, conversationMemory)).toBe(false);
    expect(service.live()).toEqual(NOTHING_LIVE);
  });

  it("starts over when a saved conversation is gone from the service", async () => {
    const { ctx, service, store, out, input } = createHarness();
    await store.save({ conversationId: "thread_gone" as ConversationId, topic: "old chat" });
    input.feed("1", "hello", "exit", "");

    expect(await runUseCase(ctx, conversationMemory)).toBe(true);

    expect(out.lines).toContain(
      `⚠️  Could not load history for "old chat" (listMessages: No thread found with id 'thread_gone'). Starting a new conversation.`
    );
    expect(out.lines).toContain('[Agent]: You said: "hello"');
    expect(await store.list()).toEqual([]);
    expect(service.live()).toEqual(NOTHING_LIVE);
  });

  it("search RAG explains missing configuration", async () => {
    const { ctx, service, out } = createHarness();
    await runUseCase(ctx, azureSearchRag);

    expect(out.lines.some((line) => line.startsWith("⚠️  Set search.connectionId and search.indexName"))).toBe(true);
    expect(service.callCount("createAgent")).toBe(0);
  });

  it("search RAG chats until exit", async () => {
    const { ctx, service, out, input } = createHarness({ search: { connectionId: "conn-test", indexName: "docs" } });
    input.feed("What is in the index?", "exit");

    await runUseCase(ctx, azureSearchRag);

    expect(out.lines).toContain(
      '[Agent]: The azure_ai_search tool runs inside the live service and is not available offline. You asked: "What is in the index?"'
    );
    expect(input.prompts).toEqual(["You: ", "You: "]);
    expect(service.live()).toEqual(NOTHING_LIVE);
  });
});
