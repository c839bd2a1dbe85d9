import { describe, test, expect } from "vitest";
import { EventEmitter } from "node:events";
import { watchOutput } from "./output";
import { createLogger } from "../logger";

describe("watchOutput", () => {
  test("logs write errors until it is disposed", () => {
    const lines: string[] = [];
    const logger = createLogger({ debug: true, stream: { write: (chunk: string) => lines.push(chunk) }, now: () => 0 });
    const output = new EventEmitter();

    const dispose = watchOutput(output, logger);
    output.emit("error", new Error("write EPIPE"));

    expect(lines).toEqual([
      '[codetype 00:00:00.000] terminal write failed {"failures":1,"error":"write EPIPE"}\n',
    ]);

    dispose();
    expect(output.listenerCount("error")).toBe(0);
    expect(() => output.emit("error", new Error("write EIO"))).toThrow("write EIO");
  });
});
