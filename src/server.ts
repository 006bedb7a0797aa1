import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { SERVER_INFO } from "./config.js";
import { PromptNotFoundError } from "./errors.js";
import type { BreakToolset } from "./tools/breakTool.js";
import type { BreakStatus } from "./types.js";
import { buildBreakStructuredContent } from "./ui/builders.js";

const statusInputSchema = z.object({
  action: z.literal("status")
});

const activityInputSchema = z.object({
  action: z.literal("activity")
});

const dismissInputSchema = z.object({
  action: z.literal("dismiss"),
  promptId: z.string().uuid()
});

const postponeInputSchema = z.object({
  action: z.literal("postpone"),
  promptId: z.string().uuid()
});

export const breakInputSchema = z.discriminatedUnion("action", [
  statusInputSchema,
  activityInputSchema,
  dismissInputSchema,
  postponeInputSchema
]);

export type BreakInput = z.infer<typeof breakInputSchema>;

export function createBreakServer(toolset: BreakToolset): McpServer {
  const server = new McpServer(
    {
      name: SERVER_INFO.name,
      version: SERVER_INFO.version
    },
    {
      capabilities: {
        logging: {}
      }
    }
  );

  server.registerTool(
    "break_reminder",
    {
      title: "Break reminder",
      description:
        "Check whether a break is due, report that the user is active, or dismiss/postpone the visible break prompt.",
      inputSchema: {
        action: z.enum(["status", "activity", "dismiss", "postpone"]).default("status"),
        promptId: z.string().uuid().optional().describe("Id of the visible prompt, required to dismiss or postpone.")
      },
      annotations: {
        readOnlyHint: false
      }
    },
    async input => {
      const parsed = breakInputSchema.safeParse(input);
      if (!parsed.success) {
        return buildError(parsed.error.issues.map(issue => issue.message).join(" "));
      }

      try {
        return await runBreakAction(toolset, parsed.data);
      } catch (error) {
        if (error instanceof PromptNotFoundError) {
          return buildError(error.message);
        }
        throw error;
      }
    }
  );

  return server;
}

export async function runBreakAction(toolset: BreakToolset, input: BreakInput) {
  switch (input.action) {
    case "activity": {
      const result = toolset.reportActivity();
      return buildResult(result.message, result.status);
    }
    case "dismiss": {
      const result = await toolset.dismissPrompt({ promptId: input.promptId });
      return buildResult(result.message, result.status);
    }
    case "postpone": {
      const result = await toolset.postponePrompt({ promptId: input.promptId });
      return buildResult(result.message, result.status);
    }
    case "status":
    default: {
      const status = toolset.status();
      return buildResult(describeStatus(status), status);
    }
  }
}

export function describeStatus(status: BreakStatus): string {
  if (status.prompt) {
    return `${status.prompt.title}: a break is due (prompt ${status.prompt.id}).`;
  }
  return buildBreakStructuredContent(status).inlineCard.body;
}

function buildResult(message: string, status: BreakStatus) {
  return {
    content: [
      {
        type: "text" as const,
        text: message
      }
    ],
    structuredContent: buildBreakStructuredContent(status)
  };
}

function buildError(message: string) {
  return {
    isError: true,
    content: [
      {
        type: "text" as const,
        text: message
      }
    ]
  };
}
