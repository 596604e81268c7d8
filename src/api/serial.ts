// src/api/serial.ts
//
// Serial adapter transports (serialport). Capture reads the adapter's text
// lines; replay writes slcan (Lawicel) ASCII frames.

import { ReadlineParser, SerialPort } from "serialport";
import type { Frame } from "../types/frame";
import { CAN_STD_ID_MAX } from "../constants";
import { TransportError, errorMessage } from "./errors";
import { tlog } from "./settings";
import { CloseLatch, type FrameSink, type LineSource } from "./transport";

/** slcan `Sn` bitrate codes */
const SLCAN_BITRATES: Record<number, string> = {
  10000: "S0",
  20000: "S1",
  50000: "S2",
  100000: "S3",
  125000: "S4",
  250000: "S5",
  500000: "S6",
  800000: "S7",
  1000000: "S8",
};

function hex(value: number, width: number): string {
  return value.toString(16).toUpperCase().padStart(width, "0");
}

/**
 * Encode a frame as an slcan transmit command:
 * `t<id:3><dlc><data>\r` for standard IDs, `T<id:8><dlc><data>\r` for extended.
 */
export function encodeSlcanFrame(frame: Frame): string {
  const data = frame.data.map((b) => hex(b, 2)).join("");
  const head = frame.id > CAN_STD_ID_MAX ? `T${hex(frame.id, 8)}` : `t${hex(frame.id, 3)}`;
  return `${head}${frame.dlc}${data}\r`;
}

function openPort(port: SerialPort): Promise<void> {
  return new Promise((resolve, reject) => {
    port.open((err) => (err ? reject(err) : resolve()));
  });
}

function closePort(port: SerialPort): Promise<void> {
  return new Promise((resolve, reject) => {
    if (!port.isOpen) {
      resolve();
      return;
    }
    port.close((err) => (err ? reject(err) : resolve()));
  });
}

function writePort(port: SerialPort, data: string): Promise<void> {
  return new Promise((resolve, reject) => {
    port.write(data, (err) => {
      if (err) {
        reject(err);
        return;
      }
      port.drain((drainErr) => (drainErr ? reject(drainErr) : resolve()));
    });
  });
}

/** Text lines from a serial CAN adapter */
export class SerialLineSource implements LineSource {
  readonly name: string;
  private port: SerialPort | null = null;
  private parser: ReadlineParser | null = null;
  private readonly latch = new CloseLatch();

  constructor(
    private readonly path: string,
    private readonly baudRate: number
  ) {
    this.name = `serial:${path}`;
  }

  async open(): Promise<void> {
    if (this.port) return;
    const port = new SerialPort({ path: this.path, baudRate: this.baudRate, autoOpen: false });
    try {
      await openPort(port);
    } catch (err) {
      throw new TransportError(`Cannot open ${this.path}: ${errorMessage(err)}`, { cause: err });
    }
    this.port = port;
    this.parser = port.pipe(new ReadlineParser({ delimiter: "\n", encoding: "utf8" }));
    tlog.info(`[serial] Opened ${this.path} @ ${this.baudRate}`);
  }

  async *lines(): AsyncGenerator<string> {
    if (!this.parser) {
      throw new TransportError(`${this.name} is not open`);
    }
    for await (const chunk of this.latch.iterate<unknown>(this.parser)) {
      yield String(chunk).replace(/\r$/, "");
    }
  }

  async close(): Promise<void> {
    this.latch.signal();
    const port = this.port;
    this.port = null;
    this.parser?.end();
    this.parser = null;
    if (port) {
      await closePort(port);
      tlog.debug(`[serial] Closed ${this.path}`);
    }
  }
}

/** slcan adapter used as a replay sink */
export class SerialFrameSink implements FrameSink {
  readonly name: string;
  private port: SerialPort | null = null;

  /**
   * @param bitrate - CAN bitrate the adapter channel is opened at; omit to leave
   *   the adapter's channel configuration alone
   */
  constructor(
    private readonly path: string,
    private readonly baudRate: number,
    private readonly bitrate?: number
  ) {
    this.name = `slcan:${path}`;
  }

  async open(): Promise<void> {
    if (this.port) return;
    let setup = "";
    if (this.bitrate !== undefined) {
      const code = SLCAN_BITRATES[this.bitrate];
      if (!code) {
        throw new TransportError(`Unsupported slcan bitrate ${this.bitrate}`);
      }
      setup = `C\r${code}\rO\r`;
    }
    const port = new SerialPort({ path: this.path, baudRate: this.baudRate, autoOpen: false });
    try {
      await openPort(port);
      if (setup) await writePort(port, setup);
    } catch (err) {
      await closePort(port).catch((closeErr: unknown) => {
        tlog.debug(`[serial] Close after failed open: ${errorMessage(closeErr)}`);
      });
      throw new TransportError(`Cannot open ${this.path}: ${errorMessage(err)}`, { cause: err });
    }
    this.port = port;
    tlog.info(`[serial] Opened slcan sink ${this.path}`);
  }

  async send(frame: Frame): Promise<void> {
    if (!this.port) {
      throw new TransportError(`${this.name} is not open`);
    }
    await writePort(this.port, encodeSlcanFrame(frame));
  }

  async close(): Promise<void> {
    const port = this.port;
    this.port = null;
    if (port) await closePort(port);
  }
}
