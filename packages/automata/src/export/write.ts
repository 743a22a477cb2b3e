import * as fs from "fs";
import { DiagramWriteError } from "../errors.js";
import { createLogger } from "../logger.js";
import type { Diagram } from "./diagram.js";

const log = createLogger("write");

/**
 * Write rendered diagram text to `path`, creating or truncating the file.
 * The handle is closed whether or not the write succeeds.
 *
 * @throws DiagramWriteError wrapping the system error on any failure
 */
export async function writeDiagram(diagram: Diagram | string, path: string): Promise<void> {
  const text = typeof diagram === "string" ? diagram : diagram.render();
  try {
    const handle = await fs.promises.open(path, "w");
    try {
      await handle.writeFile(text, "utf8");
    } finally {
      await handle.close();
    }
  } catch (error) {
    throw new DiagramWriteError(path, error);
  }
  log.debug(`wrote ${text.length} characters to ${path}`);
}
