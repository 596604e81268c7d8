// src/cli/main.ts
//
// Command-line entry: capture, replay, catalog, summarize, pid, send.
// Settings come from defaults, then CANTRACE_* variables, then flags.

import { parseArgs } from "node:util";
import type { Readable } from "node:stream";
import { ZodError } from "zod";
import { APP_NAME, APP_VERSION } from "../constants";
import {
  isLogLevel,
  loadSettings,
  setLogLevel,
  tlog,
  type AppSettings,
} from "../api/settings";
import { CantraceError, errorMessage } from "../api/errors";
import { captureError, flushTelemetry, initTelemetry } from "../api/telemetry";
import type { FrameSink } from "../api/transport";
import { createFrameSink, createLineSource, type LineSourceProfile } from "../api/profiles";
import { parseFilterIds } from "../utils/lineParser";
import { loadFrameLog } from "../utils/frameLog";
import { formatLogSummary, summarizeLog } from "../utils/logSummary";
import { formatSeconds } from "../utils/timeFormat";
import { loadPidTable, buildPidRequest, formatPid } from "../catalog/obd";
import { loadSchema, mergeCatalogFile } from "../catalog/io";
import { encodeFrame, findMessage } from "../catalog/decode";
import { CaptureSession } from "../sessions/captureSession";
import { ReplaySession } from "../sessions/replaySession";
import { SESSION_EVENTS } from "../events/registry";
import {
  bindCommands,
  CaptureCommands,
  captureStatusLine,
  formatFrameLine,
  ReplayCommands,
  replayStatusLine,
  type WriteLine,
} from "./console";
import { formatFrameId, formatPayloadHex } from "../types/frame";

export interface CliIo {
  env: NodeJS.ProcessEnv;
  stdin: Readable;
  out: WriteLine;
}

const USAGE = `${APP_NAME} ${APP_VERSION}

Usage: ${APP_NAME} <command> [options]

Commands:
  capture     Read frames from a serial adapter (or --text transcript), log to CSV
              --port P --baud N --out FILE --no-log --filter IDS --catalog FILE --text FILE
  replay      Replay a CSV log with original timing
              --in FILE --rate R --loop --sink serial|none --port P --baud N --bitrate N
  catalog     Add messages for unseen identifiers of a log to a .toml or .dbc catalog
              --in FILE --out FILE
  summarize   Print totals, top identifiers, sample payloads and OBD-II decodes of a log
              --in FILE
  pid         Send OBD-II mode 01 requests
              --pid IDS --sink serial|none --port P --baud N --bitrate N
  send        Encode one catalog message from signal values and send it
              --catalog FILE --message NAME|ID SIGNAL=VALUE... --sink serial|none

Common: --log-level off|info|debug|verbose`;

class UsageError extends CantraceError {}

const OPTIONS = {
  port: { type: "string" },
  baud: { type: "string" },
  out: { type: "string" },
  in: { type: "string" },
  "no-log": { type: "boolean" },
  filter: { type: "string" },
  catalog: { type: "string" },
  text: { type: "string" },
  rate: { type: "string" },
  loop: { type: "boolean" },
  sink: { type: "string" },
  bitrate: { type: "string" },
  pid: { type: "string" },
  message: { type: "string" },
  "log-level": { type: "string" },
  help: { type: "boolean", short: "h" },
} as const;

type Flags = ReturnType<typeof parseFlags>["values"];

function parseFlags(argv: string[]) {
  return parseArgs({ args: argv, options: OPTIONS, allowPositionals: true, strict: true });
}

function numberFlag(value: string | undefined, name: string): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isFinite(n)) throw new UsageError(`--${name} expects a number, got "${value}"`);
  return n;
}

/** Flags override environment settings */
export function applyFlags(settings: AppSettings, flags: Flags): AppSettings {
  const next = { ...settings };
  if (flags.port) next.port = flags.port;
  next.baud_rate = numberFlag(flags.baud, "baud") ?? next.baud_rate;
  if (flags.out) next.output_csv = flags.out;
  if (flags.in) next.input_csv = flags.in;
  if (flags.catalog) next.catalog_path = flags.catalog;
  next.rate = numberFlag(flags.rate, "rate") ?? next.rate;
  if (flags.loop) next.loop = true;
  if (flags.sink !== undefined) {
    if (flags.sink !== "serial" && flags.sink !== "none") {
      throw new UsageError(`--sink must be "serial" or "none"`);
    }
    next.sink = flags.sink;
  }
  if (flags["log-level"] !== undefined) {
    if (!isLogLevel(flags["log-level"])) {
      throw new UsageError(`Unknown log level "${flags["log-level"]}"`);
    }
    next.log_level = flags["log-level"];
  }
  return next;
}

function sinkFor(settings: AppSettings, flags: Flags): FrameSink {
  if (settings.sink === "none") return createFrameSink({ kind: "none" });
  return createFrameSink({
    kind: "serial",
    port: settings.port,
    baudRate: settings.baud_rate,
    bitrate: numberFlag(flags.bitrate, "bitrate"),
  });
}

// ============================================================================
// Commands
// ============================================================================

async function runCapture(settings: AppSettings, flags: Flags, io: CliIo): Promise<number> {
  const profile: LineSourceProfile = flags.text
    ? { kind: "file", path: flags.text }
    : { kind: "serial", port: settings.port, baudRate: settings.baud_rate };
  const schema = settings.catalog_path ? await loadSchema(settings.catalog_path) : undefined;

  const session = new CaptureSession({
    source: createLineSource(profile),
    filters: flags.filter ? parseFilterIds(flags.filter) : [],
    logPath: settings.output_csv,
    loggingEnabled: !flags["no-log"],
    rotateBytes: settings.log_rotate_bytes,
    schema,
  });
  session.events.on(SESSION_EVENTS.CAPTURE_FRAME, ({ frame, decoded }) => {
    io.out(formatFrameLine(frame, decoded));
  });
  session.events.on(SESSION_EVENTS.CAPTURE_STATE, () => {
    io.out(captureStatusLine(session.store.getState()));
  });

  const unbind = bindCommands(new CaptureCommands(session, io.out), io.stdin);
  const onSigint = () => session.stop();
  process.once("SIGINT", onSigint);
  try {
    const summary = await session.start();
    io.out(
      `Stopped (${summary.stopReason}): ${summary.framesProcessed} frame(s), ` +
        `${summary.framesLogged} logged, ${summary.linesRejected} rejected, ` +
        `${summary.linesDropped} dropped while paused`
    );
    io.out(session.stats.format());
    for (const rotated of summary.rotations) io.out(`Rotated: ${rotated}`);
    return summary.stopReason === "error" ? 1 : 0;
  } finally {
    process.off("SIGINT", onSigint);
    unbind();
  }
}

async function runReplay(settings: AppSettings, flags: Flags, io: CliIo): Promise<number> {
  const { frames, skipped } = await loadFrameLog(settings.input_csv);
  if (skipped > 0) tlog.info(`[replay] Skipped ${skipped} malformed row(s)`);

  const session = new ReplaySession(frames, sinkFor(settings, flags), {
    rate: settings.rate,
    loop: settings.loop,
  });
  const first = frames[0].timestamp;
  session.events.on(SESSION_EVENTS.REPLAY_FRAME, ({ frame }) => {
    io.out(formatFrameLine(frame, null, formatSeconds(frame.timestamp - first)));
  });
  session.events.on(SESSION_EVENTS.REPLAY_STATE, () => {
    io.out(replayStatusLine(session.store.getState()));
  });

  const unbind = bindCommands(new ReplayCommands(session, io.out), io.stdin);
  const onSigint = () => session.stop();
  process.once("SIGINT", onSigint);
  try {
    const result = await session.play();
    io.out(
      `Replay ${result.stopReason}: ${result.framesSent} sent, ${result.sendFailures} failed, ` +
        `${result.passes} pass(es)`
    );
    return 0;
  } finally {
    process.off("SIGINT", onSigint);
    unbind();
  }
}

async function runCatalog(settings: AppSettings, flags: Flags, io: CliIo): Promise<number> {
  const target = flags.out ?? settings.catalog_path;
  if (!target) throw new UsageError("catalog needs --out FILE (.toml or .dbc)");
  const { frames } = await loadFrameLog(settings.input_csv);
  const result = await mergeCatalogFile(target, frames, loadPidTable());
  io.out(
    `${target}: ${result.added.size} message(s) added, ${result.existingIds.size} already known`
  );
  for (const message of result.added.values()) {
    io.out(`  ${formatFrameId(message.id)} ${message.name} (${message.signals.length} signal(s))`);
  }
  return 0;
}

async function runSummarize(settings: AppSettings, io: CliIo): Promise<number> {
  const { frames } = await loadFrameLog(settings.input_csv);
  for (const line of formatLogSummary(summarizeLog(frames, loadPidTable()))) io.out(line);
  return 0;
}

async function runPid(settings: AppSettings, flags: Flags, io: CliIo): Promise<number> {
  const table = loadPidTable();
  const pids = flags.pid ? parseFilterIds(flags.pid) : [...table.pids.keys()];
  const sink = sinkFor(settings, flags);
  await sink.open();
  try {
    for (const pid of pids) {
      const request = buildPidRequest(pid);
      const label = table.pids.get(pid)?.label ?? `PID ${formatPid(pid)}`;
      try {
        await sink.send(request);
        io.out(`Sent ${label}: ${formatFrameId(request.id)} ${formatPayloadHex(request.data)}`);
      } catch (err) {
        io.out(`Error sending ${label}: ${errorMessage(err)}`);
      }
    }
  } finally {
    await sink.close();
  }
  return 0;
}

/** `EngineRPM=1726` pairs; later pairs for the same signal win */
export function parseSignalValues(pairs: readonly string[]): Map<string, number> {
  const values = new Map<string, number>();
  for (const pair of pairs) {
    const match = /^([A-Za-z_]\w*)=(.+)$/.exec(pair);
    const value = match ? Number(match[2]) : Number.NaN;
    if (!match || !Number.isFinite(value)) {
      throw new UsageError(`Expected SIGNAL=NUMBER, got "${pair}"`);
    }
    values.set(match[1], value);
  }
  return values;
}

async function runSend(
  settings: AppSettings,
  flags: Flags,
  pairs: readonly string[],
  io: CliIo
): Promise<number> {
  if (!settings.catalog_path) throw new UsageError("send needs --catalog FILE");
  if (!flags.message) throw new UsageError("send needs --message NAME or ID");
  const values = parseSignalValues(pairs);

  const message = findMessage(await loadSchema(settings.catalog_path), flags.message);
  if (!message) {
    throw new UsageError(`No message "${flags.message}" in ${settings.catalog_path}`);
  }
  const frame = encodeFrame(message, values);

  const sink = sinkFor(settings, flags);
  await sink.open();
  try {
    await sink.send(frame);
  } finally {
    await sink.close();
  }
  io.out(`Sent ${message.name}: ${formatFrameId(frame.id)} ${formatPayloadHex(frame.data)}`);
  return 0;
}

// ============================================================================
// Entry
// ============================================================================

export async function main(argv: string[], io: CliIo): Promise<number> {
  let flags: Flags;
  let command: string | undefined;
  let operands: string[];
  let settings: AppSettings;
  try {
    const parsed = parseFlags(argv);
    flags = parsed.values;
    [command, ...operands] = parsed.positionals;
    settings = applyFlags(loadSettings(io.env), flags);
  } catch (err) {
    const message =
      err instanceof ZodError
        ? err.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")
        : errorMessage(err);
    io.out(`${message}\n\n${USAGE}`);
    return 1;
  }

  if (flags.help || !command) {
    io.out(USAGE);
    return command || flags.help ? 0 : 1;
  }

  setLogLevel(settings.log_level);
  initTelemetry(settings, APP_VERSION);

  try {
    switch (command) {
      case "capture":
        return await runCapture(settings, flags, io);
      case "replay":
        return await runReplay(settings, flags, io);
      case "catalog":
        return await runCatalog(settings, flags, io);
      case "summarize":
        return await runSummarize(settings, io);
      case "pid":
        return await runPid(settings, flags, io);
      case "send":
        return await runSend(settings, flags, operands, io);
      default:
        io.out(`Unknown command "${command}"\n\n${USAGE}`);
        return 1;
    }
  } catch (err) {
    if (err instanceof UsageError) {
      io.out(`${err.message}\n\n${USAGE}`);
    } else {
      captureError(err, command);
    }
    return 1;
  } finally {
    await flushTelemetry();
  }
}
