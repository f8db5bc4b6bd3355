import fs from "node:fs/promises";
import { ScriptSource } from "./types";

/** Reads a narration script from a UTF-8 text file, such as an uploaded `.txt`. */
export class FileScriptSource implements ScriptSource {
  async loadScript(location: string): Promise<string> {
    const script = (await fs.readFile(location, "utf-8")).trim();
    if (!script) {
      throw new Error("Script file is empty");
    }
    return script;
  }
}
