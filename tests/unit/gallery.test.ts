import { promises as fs } from "node:fs";
import path from "node:path";
import { IMAGE_EXTENSIONS, VIDEO_EXTENSIONS, latestFile, listGallery } from "../../src/gallery.js";
import { makeTempDir } from "../helpers/fakes.js";

async function touch(dir: string, name: string, mtimeSeconds: number): Promise<string> {
  const full = path.join(dir, name);
  await fs.writeFile(full, name);
  await fs.utimes(full, mtimeSeconds, mtimeSeconds);
  return full;
}

describe("listGallery", () => {
  it("returns matching files newest first", async () => {
    const dir = await makeTempDir();
    const older = await touch(dir, "stability_video_20260101_100000.mp4", 1_700_000_000);
    const newer = await touch(dir, "stability_video_20260102_100000.mp4", 1_700_000_500);
    await touch(dir, "notes.txt", 1_700_000_900);
    await touch(dir, ".stability_video_tmp.part", 1_700_000_900);

    expect(await listGallery(dir, VIDEO_EXTENSIONS)).toEqual([newer, older]);
  });

  it("orders files with equal times by name, descending", async () => {
    const dir = await makeTempDir();
    const a = await touch(dir, "a.png", 1_700_000_000);
    const b = await touch(dir, "b.PNG", 1_700_000_000);

    expect(await listGallery(dir, IMAGE_EXTENSIONS)).toEqual([b, a]);
  });

  it("treats a missing directory as an empty gallery", async () => {
    const dir = path.join(await makeTempDir(), "never-created");
    expect(await listGallery(dir, VIDEO_EXTENSIONS)).toEqual([]);
    expect(await latestFile(dir, VIDEO_EXTENSIONS)).toBeNull();
  });

  it("skips directories that happen to match", async () => {
    const dir = await makeTempDir();
    await fs.mkdir(path.join(dir, "folder.png"));
    const image = await touch(dir, "real.png", 1_700_000_000);
    expect(await latestFile(dir, IMAGE_EXTENSIONS)).toBe(image);
  });
});
