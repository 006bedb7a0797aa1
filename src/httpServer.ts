#!/usr/bin/env node
import express from "express";
import cors from "cors";
import { randomUUID } from "crypto";
import type { Request, Response } from "express";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { ConfigError, PromptNotFoundError } from "./errors.js";
import { logLevelFor, parseCli, toDurations, usage, type AppConfig } from "./config.js";
import { createLogger, type Logger } from "./logging.js";
import { createBreakServer } from "./server.js";
import { BreakScheduler } from "./state/breakScheduler.js";
import { ActivityIdleTracker } from "./state/idleTracker.js";
import { PromptBoard } from "./state/promptBoard.js";
import { BreakToolset, promptActionInput } from "./tools/breakTool.js";
import { formatDuration } from "./ui/builders.js";

async function bootstrap(config: AppConfig, log: Logger) {
  const durations = toDurations(config);
  if (durations.idleThresholdMs >= durations.breakMs) {
    log.warn(
      `Idle threshold (${formatDuration(durations.idleThresholdMs)}) is not shorter than the break ` +
        `(${formatDuration(durations.breakMs)}); any detected idle period will count as a full break.`
    );
  }

  const tracker = new ActivityIdleTracker({ logger: log });
  const board = new PromptBoard({ logger: log });
  const scheduler = new BreakScheduler({
    durations,
    idleTracker: tracker,
    presenter: board,
    logger: log,
    onFatal: (error, event) => {
      log.error(`Unrecoverable error while handling ${event}, exiting`, error);
      process.exit(1);
    }
  });
  const toolset = new BreakToolset({
    scheduler,
    board,
    activity: tracker,
    postponeMs: durations.postponeMs
  });

  const app = express();
  app.use(express.json({ limit: "2mb" }));
  app.use(
    cors({
      origin: "*",
      exposedHeaders: ["Mcp-Session-Id"]
    })
  );

  const transports = new Map<string, StreamableHTTPServerTransport>();

  const createTransport = () => {
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: sessionId => {
        transports.set(sessionId, transport);
      },
      onsessionclosed: sessionId => {
        transports.delete(sessionId);
      }
    });

    transport.onclose = () => {
      const sessionId = transport.sessionId;
      if (sessionId) {
        transports.delete(sessionId);
      }
    };

    return transport;
  };

  app.post("/mcp", async (req: Request, res: Response) => {
    const sessionId = req.header("mcp-session-id") ?? undefined;

    try {
      if (sessionId) {
        const existing = transports.get(sessionId);
        if (!existing) {
          res.status(404).json({
            error: "unknown_session",
            message: "Session not found. Start a new session to initialize."
          });
          return;
        }
        await existing.handleRequest(req, res, req.body);
        return;
      }

      const transport = createTransport();
      await createBreakServer(toolset).connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      log.error("Error handling MCP POST request", error);
      if (!res.headersSent) {
        res.status(500).json({
          error: "internal_error",
          message: "The break reminder encountered an unexpected error."
        });
      }
    }
  });

  const forwardToSession = (failureMessage: string) => async (req: Request, res: Response) => {
    const sessionId = req.header("mcp-session-id") ?? undefined;
    if (!sessionId) {
      res.status(400).json({
        error: "missing_session",
        message: "Provide an MCP-Session-Id header."
      });
      return;
    }

    const transport = transports.get(sessionId);
    if (!transport) {
      res.status(404).json({
        error: "unknown_session",
        message: "Session not found."
      });
      return;
    }

    try {
      await transport.handleRequest(req, res);
    } catch (error) {
      log.error(failureMessage, error);
      if (!res.headersSent) {
        res.status(500).json({
          error: "internal_error",
          message: failureMessage
        });
      }
    }
  };

  app.get("/mcp", forwardToSession("Failed to stream MCP updates."));
  app.delete("/mcp", forwardToSession("Failed to close MCP session."));

  app.get("/status", (_req: Request, res: Response) => {
    res.json(toolset.status());
  });

  app.post("/activity", (_req: Request, res: Response) => {
    res.json(toolset.reportActivity());
  });

  const promptRoute = (action: "dismiss" | "postpone") => async (req: Request, res: Response) => {
    const parsed = promptActionInput.safeParse({ promptId: req.params.promptId });
    if (!parsed.success) {
      res.status(400).json({
        error: "invalid_request",
        message: "Prompt ids are UUIDs."
      });
      return;
    }

    try {
      const result =
        action === "dismiss" ? await toolset.dismissPrompt(parsed.data) : await toolset.postponePrompt(parsed.data);
      res.json(result);
    } catch (error) {
      if (error instanceof PromptNotFoundError) {
        res.status(404).json({
          error: "unknown_prompt",
          message: error.message
        });
        return;
      }
      log.error(`Error handling prompt ${action}`, error);
      res.status(500).json({
        error: "internal_error",
        message: "The break reminder encountered an unexpected error."
      });
    }
  };

  app.post("/prompt/:promptId/dismiss", promptRoute("dismiss"));
  app.post("/prompt/:promptId/postpone", promptRoute("postpone"));

  const serverInstance = await new Promise<ReturnType<typeof app.listen>>((resolve, reject) => {
    const listening = app.listen(config.port, () => resolve(listening));
    listening.once("error", reject);
  });
  log.info(`Break reminder listening on port ${config.port}`);

  scheduler.start();
  log.info(
    `Work ${formatDuration(durations.workMs)}, break ${formatDuration(durations.breakMs)}, ` +
      `postpone ${formatDuration(durations.postponeMs)}, idle after ${formatDuration(durations.idleThresholdMs)}`
  );

  const shutdown = async (signal: NodeJS.Signals) => {
    log.info(`Caught ${signal}, shutting down`);
    scheduler.stop();
    tracker.dispose();
    serverInstance.close();
    await Promise.all(
      [...transports.values()].map(async transport => {
        try {
          await transport.close();
        } catch (error) {
          log.error("Error closing transport", error);
        }
      })
    );
    process.exit(0);
  };

  const onSignal = (signal: NodeJS.Signals) => {
    shutdown(signal).catch(error => {
      log.error("Error during shutdown", error);
      process.exit(1);
    });
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);
}

function main() {
  let config: AppConfig;
  try {
    const cli = parseCli(process.argv.slice(2), process.env);
    if (cli.kind === "help") {
      console.log(usage);
      return;
    }
    config = cli.config;
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`idlebreak: ${error.message}\n\n${usage}`);
      process.exit(2);
    }
    throw error;
  }

  const log = createLogger(logLevelFor(config));
  bootstrap(config, log).catch(error => {
    log.error("Failed to start the break reminder", error);
    process.exit(1);
  });
}

main();
