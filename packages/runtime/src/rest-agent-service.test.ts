import { describe, it, expect, vi, beforeEach, type Mock } from "vitest";
import type { AgentId, ConversationId, Run, RunId, RunStreamEvent, ToolCallId } from "@agentdeck/types";
import { AgentServiceError } from "@agentdeck/core";
import { weatherTool } from "@agentdeck/tools";
import { RestAgentService } from "./rest-agent-service.js";

const ENDPOINT = "https://example.test/api/projects/demo";
const THREAD = "thread_1" as ConversationId;

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

/** A streamed response delivered in the given text chunks. */
function eventStream(...chunks: string[]): Response {
  const encoder = new TextEncoder();
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) controller.enqueue(encoder.encode(chunk));
      controller.close();
    },
  });
  return new Response(body, { headers: { "Content-Type": "text/event-stream" } });
}

function sseEvent(name: string, data: unknown): string {
  return `event: ${name}\ndata: ${typeof data === "string" ? data : JSON.stringify(data)}\n\n`;
}

function textDelta(value: string) {
  return { id: "msg_1", object: "thread.message.delta", delta: { content: [{ index: 0, type: "text", text: { value } }] } };
}

function wireRun(overrides: Record<string, unknown> = {}) {
  return { id: "run_1", thread_id: "thread_1", assistant_id: "asst_1", status: "queued", last_error: null, ...overrides };
}

describe("RestAgentService", () => {
  let fetchMock: Mock<typeof fetch>;
  let service: RestAgentService;

  beforeEach(() => {
    fetchMock = vi.fn<typeof fetch>();
    service = new RestAgentService({ endpoint: `${ENDPOINT}/`, accessToken: "test-secret", fetch: fetchMock });
  });

  function request(index: number): { url: URL; init: RequestInit | undefined } {
    const call = fetchMock.mock.calls[index];
    if (!call) throw new Error(`no request #${index}`);
    return { url: new URL(String(call[0])), init: call[1] };
  }

  it("creates an agent with tools, resources and response format", async () => {
    fetchMock.mockResolvedValueOnce(json({ id: "asst_1", object: "assistant", created_at: 1_700_000_000 }));

    const agent = await service.createAgent({
      model: "gpt-4o",
      name: "WeatherBot",
      instructions: "Answer weather questions.",
      tools: [weatherTool.definition, { type: "file_search" }],
      toolResources: { fileSearch: { vectorStoreIds: [] } },
      responseFormat: { type: "json_schema", jsonSchema: { name: "answer", schema: { type: "object" } } },
    });

    expect(agent).toMatchObject({ id: "asst_1", name: "WeatherBot", createdAt: "2023-11-14T22:13:20.000Z" });

    const { url, init } = request(0);
    expect(`${url.origin}${url.pathname}`).toBe(`${ENDPOINT}/assistants`);
    expect(url.searchParams.get("api-version")).toBe("v1");
    expect(init?.method).toBe("POST");
    expect(new Headers(init?.headers).get("authorization")).toBe("Bearer test-secret");
    expect(JSON.parse(String(init?.body))).toEqual({
      model: "gpt-4o",
      name: "WeatherBot",
      instructions: "Answer weather questions.",
      tools: [weatherTool.definition, { type: "file_search" }],
      tool_resources: { file_search: { vector_store_ids: [] } },
      response_format: { type: "json_schema", json_schema: { name: "answer", schema: { type: "object" } } },
    });
  });

  it("maps a run waiting for function calls", async () => {
    fetchMock.mockResolvedValueOnce(
      json(
        wireRun({
          status: "requires_action",
          required_action: {
            type: "submit_tool_outputs",
            submit_tool_outputs: {
              tool_calls: [
                { id: "call_1", type: "function", function: { name: "get_weather", arguments: '{"city":"Seattle"}' } },
                { id: "call_2", type: "code_interpreter" },
              ],
            },
          },
        })
      )
    );

    const run = await service.getRun(THREAD, "run_1" as RunId);

    expect(run).toEqual({
      id: "run_1",
      conversationId: "thread_1",
      agentId: "asst_1",
      status: "requires_action",
      requiredAction: {
        type: "submit_tool_outputs",
        toolCalls: [{ id: "call_1", name: "get_weather", arguments: '{"city":"Seattle"}' }],
      },
    });
    expect(request(0).url.pathname).toBe("/api/projects/demo/threads/thread_1/runs/run_1");
  });

  it("folds extra wire statuses into the six run states", async () => {
    fetchMock
      .mockResolvedValueOnce(json(wireRun({ status: "cancelling" })))
      .mockResolvedValueOnce(json(wireRun({ status: "expired" })))
      .mockResolvedValueOnce(json(wireRun({ status: "failed", last_error: { code: "server_error", message: "boom" } })));

    await expect(service.getRun(THREAD, "run_1" as RunId)).resolves.toMatchObject({ status: "cancelled" });
    await expect(service.getRun(THREAD, "run_1" as RunId)).resolves.toMatchObject({
      status: "failed",
      lastError: { code: "expired", message: "Run expired before completing" },
    });
    await expect(service.getRun(THREAD, "run_1" as RunId)).resolves.toMatchObject({
      status: "failed",
      lastError: { code: "server_error", message: "boom" },
    });
  });

  it("treats an unknown status as a protocol error", async () => {
    fetchMock.mockResolvedValueOnce(json(wireRun({ status: "paused" })));

    await expect(service.getRun(THREAD, "run_1" as RunId)).rejects.toMatchObject({
      code: "PROTOCOL_ERROR",
      message: "getRun: Unknown run status 'paused'",
    });
  });

  it("does not resolve statuses through the object prototype", async () => {
    fetchMock.mockResolvedValueOnce(json(wireRun({ status: "constructor" })));

    await expect(service.getRun(THREAD, "run_1" as RunId)).rejects.toMatchObject({
      code: "PROTOCOL_ERROR",
      message: "getRun: Unknown run status 'constructor'",
    });
  });

  it("releases the body of responses it does not read", async () => {
    let cancelled = false;
    const body = new ReadableStream<Uint8Array>({
      cancel() {
        cancelled = true;
      },
    });
    fetchMock.mockResolvedValueOnce(new Response(body, { status: 200 }));

    await service.deleteAgent("asst_1" as AgentId);

    expect(request(0).init?.method).toBe("DELETE");
    expect(cancelled).toBe(true);
  });

  it("submits outputs in the wire shape", async () => {
    fetchMock.mockResolvedValueOnce(json(wireRun({ status: "queued" })));
    const run: Run = { id: "run_1" as RunId, conversationId: THREAD, agentId: "asst_1" as AgentId, status: "requires_action" };

    await service.submitToolOutputs(run, [{ toolCallId: "call_1" as ToolCallId, output: '{"City":"Seattle"}' }]);

    const { url, init } = request(0);
    expect(url.pathname).toBe("/api/projects/demo/threads/thread_1/runs/run_1/submit_tool_outputs");
    expect(JSON.parse(String(init?.body))).toEqual({
      tool_outputs: [{ tool_call_id: "call_1", output: '{"City":"Seattle"}' }],
    });
  });

  it("follows message pages and maps content blocks", async () => {
    fetchMock
      .mockResolvedValueOnce(
        json({
          data: [
            {
              id: "msg_3",
              thread_id: "thread_1",
              role: "assistant",
              created_at: 1_700_000_002,
              run_id: "run_1",
              content: [
                { type: "text", text: { value: "It is sunny.", annotations: [] } },
                { type: "image_file", image_file: { file_id: "file_1" } },
              ],
            },
            { id: "msg_2", thread_id: "thread_1", role: "user", created_at: 1_700_000_001, content: [] },
          ],
          has_more: true,
          last_id: "msg_2",
        })
      )
      .mockResolvedValueOnce(
        json({
          data: [
            {
              id: "msg_1",
              thread_id: "thread_1",
              role: "user",
              created_at: 1_700_000_000,
              run_id: null,
              content: [{ type: "image_url", image_url: { url: "https://example.test/a.png", detail: "low" } }],
            },
          ],
          has_more: false,
          last_id: "msg_1",
        })
      );

    const messages = await service.listMessages(THREAD, { order: "desc" });

    expect(messages.map((m) => [m.id, m.role, m.content])).toEqual([
      ["msg_3", "agent", [{ type: "text", text: "It is sunny." }]],
      ["msg_2", "user", []],
      ["msg_1", "user", [{ type: "image_url", url: "https://example.test/a.png", detail: "low" }]],
    ]);
    expect(messages[0]?.runId).toBe("run_1");
    expect(messages[2]?.runId).toBeUndefined();
    expect(request(0).url.searchParams.get("after")).toBeNull();
    expect(request(1).url.searchParams.get("after")).toBe("msg_2");
    expect(request(1).url.searchParams.get("order")).toBe("desc");
  });

  it("stops paging once the limit is reached", async () => {
    fetchMock.mockResolvedValueOnce(
      json({
        data: [{ id: "msg_9", thread_id: "thread_1", role: "assistant", created_at: 1, content: [] }],
        has_more: true,
        last_id: "msg_9",
      })
    );

    const messages = await service.listMessages(THREAD, { order: "desc", limit: 1 });

    expect(messages).toHaveLength(1);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(request(0).url.searchParams.get("limit")).toBe("1");
  });

  it("sends user content as plain text or typed blocks", async () => {
    const echo = { id: "msg_1", thread_id: "thread_1", role: "user", created_at: 1, content: [] };
    fetchMock.mockResolvedValueOnce(json(echo)).mockResolvedValueOnce(json(echo));

    await service.appendMessage(THREAD, "user", "hello");
    await service.appendMessage(THREAD, "user", [
      { type: "text", text: "What is this?" },
      { type: "image_url", url: "https://example.test/cat.jpg", detail: "high" },
    ]);

    expect(JSON.parse(String(request(0).init?.body))).toEqual({ role: "user", content: "hello" });
    expect(JSON.parse(String(request(1).init?.body))).toEqual({
      role: "user",
      content: [
        { type: "text", text: "What is this?" },
        { type: "image_url", image_url: { url: "https://example.test/cat.jpg", detail: "high" } },
      ],
    });
  });

  it("classifies HTTP failures by retryability", async () => {
    fetchMock
      .mockResolvedValueOnce(json({ error: { message: "Rate limit is exceeded" } }, 429))
      .mockResolvedValueOnce(new Response("no such thread", { status: 404 }));

    await expect(service.createConversation()).rejects.toMatchObject({
      code: "HTTP_ERROR",
      status: 429,
      retryable: true,
      message: "createConversation: HTTP 429: Rate limit is exceeded",
    });
    await expect(service.deleteConversation(THREAD)).rejects.toMatchObject({
      code: "HTTP_ERROR",
      status: 404,
      retryable: false,
      message: "deleteConversation: HTTP 404: no such thread",
    });
  });

  it("wraps network failures as retryable transport errors", async () => {
    fetchMock.mockRejectedValueOnce(new TypeError("fetch failed"));

    const err = await service.createConversation().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(AgentServiceError);
    expect(err).toMatchObject({ code: "TRANSPORT_ERROR", retryable: true, message: "createConversation: fetch failed" });
  });

  it("rejects responses of the wrong shape", async () => {
    fetchMock.mockResolvedValueOnce(json({ object: "thread" }));

    await expect(service.createConversation()).rejects.toMatchObject({
      code: "PROTOCOL_ERROR",
      message: "createConversation: Unexpected response shape: id: Required",
    });
  });

  it("uploads files as multipart form data", async () => {
    fetchMock.mockResolvedValueOnce(json({ id: "assistant-file-1", object: "file" }));

    const fileId = await service.uploadFile("policies.md", "# Policies");

    expect(fileId).toBe("assistant-file-1");
    const body = request(0).init?.body;
    expect(body).toBeInstanceOf(FormData);
    if (!(body instanceof FormData)) return;
    expect(body.get("purpose")).toBe("assistants");
    const file = body.get("file");
    expect(file).toBeInstanceOf(Blob);
    if (file instanceof Blob) await expect(file.text()).resolves.toBe("# Policies");
  });

  it("maps vector store status and counts", async () => {
    fetchMock.mockResolvedValueOnce(
      json({ id: "vs_1", name: "docs", status: "completed", file_counts: { in_progress: 0, completed: 2, failed: 0, cancelled: 0, total: 2 } })
    );

    await expect(service.createVectorStore("docs", [])).resolves.toEqual({
      id: "vs_1",
      name: "docs",
      status: "completed",
      fileCounts: { inProgress: 0, completed: 2, failed: 0 },
    });
  });

  describe("createRunStream", () => {
    async function collect(events: AsyncIterable<RunStreamEvent>): Promise<RunStreamEvent[]> {
      const seen: RunStreamEvent[] = [];
      for await (const event of events) seen.push(event);
      return seen;
    }

    it("assembles text deltas split across network chunks", async () => {
      const stream = [
        sseEvent("thread.run.created", wireRun()),
        sseEvent("thread.run.step.created", { id: "step_1", object: "thread.run.step" }),
        sseEvent("thread.message.delta", textDelta("Hello")),
        sseEvent("thread.message.delta", textDelta(", world")),
        sseEvent("thread.message.completed", {
          id: "msg_1",
          thread_id: "thread_1",
          role: "assistant",
          content: [{ type: "text", text: { value: "Hello, world", annotations: [] } }],
          created_at: 1_700_000_000,
          run_id: "run_1",
        }),
        sseEvent("thread.run.completed", wireRun({ status: "completed" })),
        sseEvent("done", "[DONE]"),
      ].join("");
      fetchMock.mockResolvedValueOnce(eventStream(stream.slice(0, 50), stream.slice(50, 170), stream.slice(170)));

      const events = await collect(service.createRunStream(THREAD, "asst_1" as AgentId));

      expect(events.map((event) => event.kind)).toEqual(["status", "delta", "delta", "message", "status"]);
      expect(events.flatMap((event) => (event.kind === "delta" ? [event.text] : [])).join("")).toBe("Hello, world");
      expect(events[1]).toEqual({ kind: "delta", messageId: "msg_1", text: "Hello" });
      expect(events[3]).toMatchObject({ kind: "message", message: { role: "agent", content: [{ type: "text", text: "Hello, world" }] } });
      expect(events[4]).toMatchObject({ kind: "status", run: { id: "run_1", status: "completed" } });

      const { url, init } = request(0);
      expect(url.pathname).toBe("/api/projects/demo/threads/thread_1/runs");
      expect(new Headers(init?.headers).get("accept")).toBe("text/event-stream");
      expect(JSON.parse(String(init?.body))).toEqual({ assistant_id: "asst_1", stream: true });
    });

    it("raises the error event of a stream", async () => {
      fetchMock.mockResolvedValueOnce(
        eventStream(
          sseEvent("thread.run.created", wireRun()),
          sseEvent("error", { error: { code: "rate_limit_exceeded", message: "Rate limit reached" } })
        )
      );

      await expect(collect(service.createRunStream(THREAD, "asst_1" as AgentId))).rejects.toMatchObject({
        code: "PROTOCOL_ERROR",
        message: "createRunStream: Stream reported an error: Rate limit reached",
      });
    });

    it("rejects event data that is not JSON", async () => {
      fetchMock.mockResolvedValueOnce(eventStream(sseEvent("thread.message.delta", "{oops")));

      await expect(collect(service.createRunStream(THREAD, "asst_1" as AgentId))).rejects.toMatchObject({
        code: "PROTOCOL_ERROR",
      });
    });

    it("reports HTTP failures before any event", async () => {
      fetchMock.mockResolvedValueOnce(json({ error: { message: "Thread not found" } }, 404));

      await expect(collect(service.createRunStream(THREAD, "asst_1" as AgentId))).rejects.toMatchObject({
        code: "HTTP_ERROR",
        status: 404,
        message: "createRunStream: HTTP 404: Thread not found",
      });
    });
  });
});
