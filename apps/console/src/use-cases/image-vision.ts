import type { AgentConfig, ConversationId } from "@agentdeck/types";
import type { DemoContext } from "../context.js";
import type { UseCase } from "../use-case.js";
import { converse } from "../conversation.js";
import { defineAgent, scoped } from "./shared.js";

export interface SampleImage {
  readonly question: string;
  readonly url: string;
}

export const SAMPLE_IMAGES: ReadonlyArray<SampleImage> = [
  {
    question: "This is a cloud architecture diagram. Which services are shown and how do they connect?",
    url: "https://learn.microsoft.com/en-us/azure/architecture/browse/thumbs/basic-web-app.png",
  },
  {
    question: "What programming language is this? Explain what the code does.",
    url: "https://upload.wikimedia.org/wikipedia/commons/thumb/b/b5/Hello_World_in_Python.png/640px-Hello_World_in_Python.png",
  },
  {
    question: "What is shown in this picture, and what season does it look like?",
    url: "https://upload.wikimedia.org/wikipedia/commons/thumb/d/dd/Gfp-wisconsin-madison-the-nature-boardwalk.jpg/2560px-Gfp-wisconsin-madison-the-nature-boardwalk.jpg",
  },
];

export const imageVision: UseCase = {
  id: "image-vision",
  title: "Image Understanding",
  summary: "User messages that carry an image URL next to the question, then one image of your own.",
  run: (ctx) =>
    scoped(ctx, async (scope) => {
      const agent = await scope.createAgent(
        defineAgent(ctx, {
          name: "VisionAssistant",
          instructions:
            "Describe images precisely: objects, text, colours and the likely setting. Interpret diagrams and charts. Say so when an image is unclear.",
        })
      );
      const conversationId = await scope.createConversation();
      for (const image of SAMPLE_IMAGES) {
        await askAboutImage(ctx, agent, conversationId, image);
      }
      await askAboutOwnImage(ctx, agent, conversationId);
    }),
};

async function askAboutImage(
  ctx: DemoContext,
  agent: AgentConfig,
  conversationId: ConversationId,
  image: SampleImage
): Promise<void> {
  await converse(ctx, agent, conversationId, [
    { type: "text", text: image.question },
    { type: "image_url", url: image.url, detail: "auto" },
  ]);
}

/** Optional turn on a URL the user pastes; skipped on empty input. */
async function askAboutOwnImage(ctx: DemoContext, agent: AgentConfig, conversationId: ConversationId): Promise<void> {
  ctx.out.line("── Try your own image");
  const url = (await ctx.input.ask("Paste an image URL (or press Enter to skip): "))?.trim();
  if (!url || !isWebUrl(url)) {
    ctx.out.line("Skipping custom image analysis.");
    return;
  }
  const question = (await ctx.input.ask("What would you like to know about this image? "))?.trim();
  if (!question) {
    ctx.out.line("Skipping custom image analysis.");
    return;
  }
  await askAboutImage(ctx, agent, conversationId, { question, url });
}

function isWebUrl(text: string): boolean {
  try {
    const { protocol } = new URL(text);
    return protocol === "http:" || protocol === "https:";
  } catch {
    return false;
  }
}
