import { randomUUID } from "node:crypto";
import { promises as fs } from "node:fs";
import path from "node:path";
import { format } from "date-fns";
import { LocalIOError, errorMessage } from "../errors.js";

export interface ArtifactNaming {
  tag: string;
  extension: string;
}

export const VIDEO_ARTIFACT: ArtifactNaming = { tag: "stability_video", extension: "mp4" };
export const IMAGE_ARTIFACT: ArtifactNaming = { tag: "stability", extension: "png" };

const MAX_NAME_ATTEMPTS = 1000;

export function artifactFileName(naming: ArtifactNaming, at: number, attempt = 1): string {
  const stamp = format(new Date(at), "yyyyMMdd_HHmmss");
  const suffix = attempt > 1 ? `_${attempt}` : "";
  return `${naming.tag}_${stamp}${suffix}.${naming.extension}`;
}

function errnoCode(e: unknown): string | null {
  if (e instanceof Error && "code" in e && typeof e.code === "string") return e.code;
  return null;
}

export class ArtifactMaterializer {
  constructor(
    readonly outputDir: string,
    private readonly naming: ArtifactNaming,
  ) {}

  /** Recursive mkdir; safe to call any number of times, concurrently. */
  async ensureOutputDir(): Promise<void> {
    try {
      await fs.mkdir(this.outputDir, { recursive: true });
    } catch (e) {
      throw new LocalIOError(this.outputDir, errnoCode(e), `cannot create output directory: ${errorMessage(e)}`, {
        cause: e,
      });
    }
  }

  /**
   * Writes `bytes` to a uniquely named file and returns its absolute path.
   * The final name only appears once the content is complete: bytes go to a
   * temporary file first, which is then hard-linked into place. Linking never
   * replaces an existing file, so a name taken within the same second gets a
   * numeric suffix.
   */
  async write(bytes: Uint8Array, at: number): Promise<string> {
    await this.ensureOutputDir();
    const dir = path.resolve(this.outputDir);
    const tmpPath = path.join(dir, `.${this.naming.tag}_${randomUUID()}.part`);

    try {
      await fs.writeFile(tmpPath, bytes, { flag: "wx" });
    } catch (e) {
      await fs.rm(tmpPath, { force: true });
      throw new LocalIOError(tmpPath, errnoCode(e), `cannot write artifact: ${errorMessage(e)}`, { cause: e });
    }

    try {
      for (let attempt = 1; attempt <= MAX_NAME_ATTEMPTS; attempt++) {
        const finalPath = path.join(dir, artifactFileName(this.naming, at, attempt));
        try {
          await fs.link(tmpPath, finalPath);
          return finalPath;
        } catch (e) {
          if (errnoCode(e) === "EEXIST") continue;
          throw new LocalIOError(finalPath, errnoCode(e), `cannot publish artifact: ${errorMessage(e)}`, {
            cause: e,
          });
        }
      }
      throw new LocalIOError(dir, "EEXIST", `no free artifact name after ${MAX_NAME_ATTEMPTS} attempts`);
    } finally {
      await fs.rm(tmpPath, { force: true });
    }
  }
  /** Removes an artifact this materializer wrote that is no longer wanted. */
  async discard(filePath: string): Promise<void> {
    try {
      await fs.rm(filePath, { force: true });
    } catch (e) {
      throw new LocalIOError(filePath, errnoCode(e), `cannot remove artifact: ${errorMessage(e)}`, { cause: e });
    }
  }
}
