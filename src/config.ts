import { parseArgs } from "util";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { LogLevel } from "./logging.js";
import type { BreakDurations } from "./types.js";

export const SERVER_INFO = {
  name: "idlebreak",
  version: "0.3.0"
};

export const DEFAULT_PORT = 2091;
export const MINUTE_MS = 60_000;
/** Longest delay `setTimeout` honours; anything above it fires after 1 ms. */
export const MAX_TIMER_MS = 2_147_483_647;

const minutes = (label: string, fallback: number) =>
  z.coerce
    .number({ invalid_type_error: `${label} must be a number of minutes.` })
    .finite(`${label} must be a finite number of minutes.`)
    .positive(`${label} must be greater than zero minutes.`)
    .default(fallback);

export const configSchema = z
  .object({
    workMinutes: minutes("Work duration", 60),
    breakMinutes: minutes("Break duration", 5),
    postponeMinutes: minutes("Postpone duration", 5),
    idleMinutes: minutes("Idle threshold", 1),
    minuteMs: z.coerce.number().int().positive("Minute length must be a positive number of milliseconds.").default(MINUTE_MS),
    port: z.coerce.number().int().min(1).max(65535).default(DEFAULT_PORT),
    debug: z.boolean().default(false)
  })
  .superRefine((value, ctx) => {
    const limit = Math.floor(MAX_TIMER_MS / value.minuteMs);
    const durations = [
      ["workMinutes", "Work duration"],
      ["breakMinutes", "Break duration"],
      ["postponeMinutes", "Postpone duration"],
      ["idleMinutes", "Idle threshold"]
    ] as const;
    for (const [key, label] of durations) {
      if (value[key] * value.minuteMs > MAX_TIMER_MS) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `${label} must be at most ${limit} minutes.`,
          path: [key]
        });
      }
    }
    if (value.idleMinutes >= value.workMinutes) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "Idle threshold must be shorter than the work duration.",
        path: ["idleMinutes"]
      });
    }
  });

export type AppConfig = z.infer<typeof configSchema>;

export const usage = `Usage: idlebreak [options]

  --work <minutes>       Active time before a break is due (default 60)
  --break <minutes>      Idle time that counts as a break (default 5)
  --postpone <minutes>   Delay before a dismissed reminder returns (default 5)
  --idle <minutes>       Inactivity before the user counts as idle (default 1)
  --port <port>          HTTP port for the MCP and REST endpoints (default 2091)
  --debug                Verbose logging
  -h, --help             Show this message`;

export type CliResult = { kind: "help" } | { kind: "run"; config: AppConfig };

function readFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        work: { type: "string" },
        break: { type: "string" },
        postpone: { type: "string" },
        idle: { type: "string" },
        port: { type: "string" },
        "minute-ms": { type: "string" },
        debug: { type: "boolean", short: "d" },
        help: { type: "boolean", short: "h" }
      }
    }).values;
  } catch (error) {
    throw new ConfigError(error instanceof Error ? error.message : String(error));
  }
}

export function parseCli(argv: string[], env: NodeJS.ProcessEnv = {}): CliResult {
  const values = readFlags(argv);

  if (values.help) {
    return { kind: "help" };
  }

  const parsed = configSchema.safeParse({
    workMinutes: values.work,
    breakMinutes: values.break,
    postponeMinutes: values.postpone,
    idleMinutes: values.idle,
    minuteMs: values["minute-ms"],
    port: values.port ?? env.PORT,
    debug: values.debug ?? false
  });

  if (!parsed.success) {
    const details = parsed.error.issues.map(issue => issue.message).join(" ");
    throw new ConfigError(details);
  }

  return { kind: "run", config: parsed.data };
}

export function toDurations(config: AppConfig): BreakDurations {
  return {
    workMs: config.workMinutes * config.minuteMs,
    breakMs: config.breakMinutes * config.minuteMs,
    postponeMs: config.postponeMinutes * config.minuteMs,
    idleThresholdMs: config.idleMinutes * config.minuteMs
  };
}

export function logLevelFor(config: AppConfig): LogLevel {
  return config.debug ? "debug" : "info";
}
