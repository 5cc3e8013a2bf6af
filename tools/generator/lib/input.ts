import { existsSync, readFileSync } from "fs";
import { emitProcessorEvent } from "../pipeline/events.js";
import { InputError } from "../pipeline/errors.js";

export type TextEncodingName = "utf-8" | "latin1";

export interface DecodedText {
  text: string;
  encoding: TextEncodingName;
  bytes: number;
}

export function readTextWithFallback(path: string): DecodedText {
  if (!existsSync(path)) {
    throw new InputError(`Input file not found: ${path}`);
  }

  let buffer: Buffer;
  try {
    buffer = readFileSync(path);
  } catch (error) {
    throw new InputError(`Could not read input file: ${path}`, error);
  }

  emitProcessorEvent({
    level: "debug",
    eventType: "file.read",
    message: "Read input file",
    path,
    bytes: buffer.length,
  });

  return decodeText(buffer, path);
}

export function decodeText(buffer: Uint8Array, path?: string): DecodedText {
  try {
    const text = new TextDecoder("utf-8", { fatal: true, ignoreBOM: false }).decode(buffer);
    return { text, encoding: "utf-8", bytes: buffer.length };
  } catch (error) {
    emitProcessorEvent({
      level: "info",
      eventType: "input.decode",
      message: "UTF-8 decoding failed, retrying with latin-1",
      path,
      reason: error instanceof Error ? error.message : String(error),
    });
    const text = new TextDecoder("latin1").decode(buffer);
    return { text, encoding: "latin1", bytes: buffer.length };
  }
}
