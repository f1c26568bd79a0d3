/** One server-sent event. `event` defaults to "message" when the block names none. */
export interface ServerSentEvent {
  readonly event: string;
  readonly data: string;
}

/**
 * Split buffered stream text into complete events. Returns the events and
 * the unterminated tail, which belongs in front of the next chunk.
 */
export function parseEventBuffer(buffer: string): { events: ServerSentEvent[]; remaining: string } {
  const blocks = buffer.replace(/\r\n/g, "\n").split("\n\n");
  const remaining = blocks.pop() ?? "";
  const events: ServerSentEvent[] = [];
  for (const block of blocks) {
    const event = parseBlock(block);
    if (event) events.push(event);
  }
  return { events, remaining };
}

function parseBlock(block: string): ServerSentEvent | undefined {
  let event = "message";
  const data: string[] = [];

  for (const line of block.split("\n")) {
    if (!line || line.startsWith(":")) continue; // comment / keep-alive
    const colon = line.indexOf(":");
    const field = colon === -1 ? line : line.slice(0, colon);
    let value = colon === -1 ? "" : line.slice(colon + 1);
    if (value.startsWith(" ")) value = value.slice(1);

    if (field === "event") event = value;
    else if (field === "data") data.push(value);
  }
  return data.length === 0 ? undefined : { event, data: data.join("\n") };
}

/** Decode a byte stream into events as they complete. */
export async function* readServerSentEvents(body: ReadableStream<Uint8Array>): AsyncGenerator<ServerSentEvent> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = "";

  try {
    for (;;) {
      const { done, value } = await reader.read();
      // A final event without its blank line still counts.
      buffer += done ? `${decoder.decode()}\n\n` : decoder.decode(value, { stream: true });

      const { events, remaining } = parseEventBuffer(buffer);
      buffer = remaining;
      yield* events;
      if (done) return;
    }
  } finally {
    await reader.cancel();
  }
}
