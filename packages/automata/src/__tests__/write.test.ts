import { afterEach, beforeEach, describe, it, expect } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { stringKey } from "@automata-diagrams/collections";
import { DiagramWriteError, Mermaid, Nfa, config, writeDiagram } from "../index.js";

describe("writeDiagram", () => {
  let dir: string;

  beforeEach(() => {
    config.reset();
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "automata-write-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("writes rendered diagram text", async () => {
    const diagram = Mermaid.from(new Nfa(stringKey, stringKey).addTransition("a", "x", "b"));
    const file = path.join(dir, "machine.mmd");
    await writeDiagram(diagram, file);
    expect(fs.readFileSync(file, "utf8")).toBe("stateDiagram-v2\na --> b : x\n");
  });

  it("writes plain text and truncates an existing file", async () => {
    const file = path.join(dir, "out.txt");
    fs.writeFileSync(file, "previous contents that are longer");
    await writeDiagram("short\n", file);
    expect(fs.readFileSync(file, "utf8")).toBe("short\n");
  });

  it("writes through the diagram's own method", async () => {
    const diagram = Mermaid.from(new Nfa(stringKey, stringKey));
    const file = path.join(dir, "empty.mmd");
    await diagram.writeTo(file);
    expect(fs.readFileSync(file, "utf8")).toBe("stateDiagram-v2\n");
  });

  it("rejects with the path and the system error", async () => {
    const file = path.join(dir, "missing", "out.txt");
    const error: unknown = await writeDiagram("text", file).then(
      () => undefined,
      (e: unknown) => e
    );
    expect(error).toBeInstanceOf(DiagramWriteError);
    if (error instanceof DiagramWriteError) {
      expect(error.path).toBe(file);
      expect(error.cause).toMatchObject({ code: "ENOENT" });
      expect(error.message.startsWith(`Failed to write diagram to ${file}: `)).toBe(true);
    }
  });
});
