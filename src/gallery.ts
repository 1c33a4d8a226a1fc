import { promises as fs } from "node:fs";
import path from "node:path";

export const VIDEO_EXTENSIONS = [".mp4"];
export const IMAGE_EXTENSIONS = [".png", ".jpg", ".jpeg", ".webp"];

/**
 * Absolute paths of the files in `dir` with one of `extensions`, newest
 * first. A directory that does not exist yet has an empty gallery.
 */
export async function listGallery(dir: string, extensions: string[]): Promise<string[]> {
  const root = path.resolve(dir);
  let names: string[];
  try {
    names = await fs.readdir(root);
  } catch (e) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") return [];
    throw e;
  }

  const wanted = new Set(extensions.map((ext) => ext.toLowerCase()));
  const entries = await Promise.all(
    names
      .filter((name) => !name.startsWith(".") && wanted.has(path.extname(name).toLowerCase()))
      .map(async (name) => {
        const full = path.join(root, name);
        const stat = await fs.stat(full);
        return { full, name, mtimeMs: stat.mtimeMs, isFile: stat.isFile() };
      }),
  );

  return entries
    .filter((e) => e.isFile)
    .sort((a, b) => b.mtimeMs - a.mtimeMs || b.name.localeCompare(a.name))
    .map((e) => e.full);
}

export async function latestFile(dir: string, extensions: string[]): Promise<string | null> {
  const files = await listGallery(dir, extensions);
  return files[0] ?? null;
}
