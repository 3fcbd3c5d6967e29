/**
 * NodeHostStorage - HostStorage on top of synchronous node:fs calls
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs";
import * as nodePath from "node:path";
import { errnoCode } from "../errors.js";
import type { HostEntryKind, HostStorage } from "./host-storage.js";

export class NodeHostStorage implements HostStorage {
  kind(hostPath: string): HostEntryKind | null {
    let stat: fs.Stats | undefined;
    try {
      stat = fs.lstatSync(hostPath, { throwIfNoEntry: false });
    } catch (e) {
      // A file in the middle of the path: nothing can exist below it
      if (errnoCode(e) === "ENOTDIR") return null;
      throw e;
    }
    if (!stat) return null;
    if (stat.isSymbolicLink()) return "symlink";
    if (stat.isDirectory()) return "directory";
    return "file";
  }

  isDirectory(hostPath: string): boolean {
    try {
      return fs.statSync(hostPath, { throwIfNoEntry: false })?.isDirectory() ?? false;
    } catch (e) {
      if (errnoCode(e) === "ENOTDIR" || errnoCode(e) === "ELOOP") return false;
      throw e;
    }
  }

  mkdir(hostPath: string): void {
    fs.mkdirSync(hostPath);
  }

  readFile(hostPath: string): Uint8Array {
    if (this.kind(hostPath) === "symlink") {
      return new Uint8Array(fs.readlinkSync(hostPath, { encoding: "buffer" }));
    }
    return new Uint8Array(fs.readFileSync(hostPath));
  }

  /**
   * Write to a sibling temp file, then rename it over the target so the
   * target is never observed half written.
   */
  writeFile(hostPath: string, content: Uint8Array): void {
    const temp = nodePath.join(
      nodePath.dirname(hostPath),
      `.${nodePath.basename(hostPath)}.${randomUUID()}.tmp`,
    );
    try {
      fs.writeFileSync(temp, content);
      fs.renameSync(temp, hostPath);
    } catch (e) {
      fs.rmSync(temp, { force: true });
      throw e;
    }
  }

  appendFile(hostPath: string, content: Uint8Array): void {
    fs.appendFileSync(hostPath, content);
  }

  removeFile(hostPath: string): void {
    fs.unlinkSync(hostPath);
  }

  removeDir(hostPath: string): void {
    fs.rmdirSync(hostPath);
  }

  removeTree(hostPath: string): void {
    fs.rmSync(hostPath, { recursive: true, force: true });
  }

  readdir(hostPath: string): string[] {
    return fs.readdirSync(hostPath).sort();
  }
}
