import { describe, it, expect } from "vitest";
import { createFrame } from "../types/frame";
import { loadPidTable } from "./obd";
import { synthesizeCatalog } from "./synthesize";
import { CatalogError } from "../api/errors";
import { decodeFrame, encodeFrame, findMessage, formatDecoded } from "./decode";

const frame = (id: number, ...data: number[]) => createFrame(0, id, data.length, data);

const schema = synthesizeCatalog(
  [frame(0x7e8, 0x41, 0x0c, 0x1a, 0xf8), frame(0x7e8, 0x41, 0x0d, 0x3c), frame(0x200, 0xaa, 0xbb)],
  new Set(),
  loadPidTable()
);

describe("decodeFrame", () => {
  it("decodes only the signals of the active mux case", () => {
    const decoded = decodeFrame(schema, frame(0x7e8, 0x41, 0x0d, 0x3c));
    expect(decoded?.map((d) => [d.signal, d.scaled])).toEqual([
      ["Service", 0x41],
      ["PID", 0x0d],
      ["VehicleSpeed", 60],
    ]);
  });

  it("leaves out signals that do not fit the payload", () => {
    const decoded = decodeFrame(schema, frame(0x7e8, 0x41, 0x0c, 0x1a));
    expect(decoded?.map((d) => d.signal)).toEqual(["Service", "PID"]);
  });

  it("decodes raw byte messages", () => {
    const decoded = decodeFrame(schema, frame(0x200, 0xaa, 0xbb));
    expect(decoded?.map((d) => d.value)).toEqual([0xaa, 0xbb]);
  });

  it("returns null for identifiers outside the schema", () => {
    expect(decodeFrame(schema, frame(0x300, 1))).toBeNull();
  });
});

describe("formatDecoded", () => {
  it("joins name=value+unit pairs", () => {
    const decoded = decodeFrame(schema, frame(0x7e8, 0x41, 0x0c, 0x1a, 0xf8)) ?? [];
    expect(formatDecoded(decoded)).toBe("Service=65 PID=12 EngineRPM=1726rpm");
  });
});

describe("encodeFrame", () => {
  const response = schema.get(0x7e8);
  if (!response) throw new Error("synthesized catalog lacks 0x7E8");

  it("encodes values that decode back to the same values", () => {
    const encoded = encodeFrame(response, new Map([["Service", 65], ["PID", 12], ["EngineRPM", 1726]]));
    expect(encoded.id).toBe(0x7e8);
    expect(encoded.data).toEqual([0x41, 0x0c, 0x1a, 0xf8]);
    expect(decodeFrame(schema, encoded)?.map((d) => [d.signal, d.scaled])).toEqual([
      ["Service", 65],
      ["PID", 12],
      ["EngineRPM", 1726],
    ]);
  });

  it("sets the selector from the mux case and zeroes unnamed signals", () => {
    const encoded = encodeFrame(response, new Map([["VehicleSpeed", 60]]), 2.5);
    expect(encoded.timestamp).toBe(2.5);
    expect(encoded.data).toEqual([0x00, 0x0d, 0x3c, 0x00]);
  });

  it("rejects unknown signals, mixed cases and a conflicting selector", () => {
    expect(() => encodeFrame(response, new Map([["Nope", 1]]))).toThrow(CatalogError);
    expect(() => encodeFrame(response, new Map([["EngineRPM", 1], ["VehicleSpeed", 1]]))).toThrow(
      CatalogError
    );
    expect(() => encodeFrame(response, new Map([["PID", 13], ["EngineRPM", 1]]))).toThrow(CatalogError);
  });

  it("reports values outside the field range", () => {
    expect(() => encodeFrame(response, new Map([["VehicleSpeed", 256]]))).toThrow(
      "MSG_7E8: VehicleSpeed: 256 is outside the field range"
    );
  });
});

describe("findMessage", () => {
  it("finds a message by name, hex or decimal identifier", () => {
    expect(findMessage(schema, "MSG_200")?.id).toBe(0x200);
    expect(findMessage(schema, "0x7E8")?.name).toBe("MSG_7E8");
    expect(findMessage(schema, "512")?.name).toBe("MSG_200");
    expect(findMessage(schema, "MSG_999")).toBeNull();
  });
});
