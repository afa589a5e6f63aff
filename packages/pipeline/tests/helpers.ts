import type {
  ExportRequest,
  HostExportOutcome,
  OutfitHost,
} from "@outfit-forge/combinator";
import fs from "fs-extra";
import os from "os";
import path from "path";

export async function makeTempDir(prefix = "outfit-forge-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

/**
 * Create empty files under `root`; discovery only looks at names
 */
export async function touchAll(
  root: string,
  files: readonly string[],
): Promise<void> {
  for (const file of files) {
    await fs.outputFile(path.join(root, file), "");
  }
}

/**
 * Host that records requests and reports every export as written
 */
export class RecordingHost implements OutfitHost {
  readonly requests: ExportRequest[] = [];

  async exportCombination(request: ExportRequest): Promise<HostExportOutcome> {
    this.requests.push(request);
    return { ok: true, path: path.join(request.exportDir, request.fileName) };
  }
}
