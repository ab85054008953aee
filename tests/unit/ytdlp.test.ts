import { chmod, readdir, writeFile } from "fs/promises";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { YtDlpFetcher } from "../../src/services/external/ytdlp.js";
import { FetchCancelledError, FetchFailedError } from "../../src/utils/errors.js";
import { makeTempDir, removeTempDir, silenceConsole } from "../helpers/fakes.js";

/**
 * Writes a stand-in yt-dlp: answers the metadata call with `metadataJson`,
 * then runs `downloadStep` with $base set to the output path minus its extension.
 */
async function writeFakeYtDlp(binDir: string, metadataJson: string, downloadStep: string): Promise<string> {
  const script = `#!/bin/sh
for arg in "$@"; do
  if [ "$arg" = "--dump-single-json" ]; then
    echo '${metadataJson}'
    exit 0
  fi
done
prev=""
for arg in "$@"; do
  if [ "$prev" = "--output" ]; then out="$arg"; fi
  prev="$arg"
done
base=$(printf '%s' "$out" | sed 's/\\.%(ext)s$//')
${downloadStep}
`;
  const binaryPath = path.join(binDir, "yt-dlp");
  await writeFile(binaryPath, script);
  await chmod(binaryPath, 0o755);
  return binaryPath;
}

describe("YtDlpFetcher", () => {
  let dir: string;
  let binDir: string;

  beforeEach(async () => {
    silenceConsole();
    dir = await makeTempDir();
    binDir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
    await removeTempDir(binDir);
  });

  it("fails with a cancellation error when the signal is already aborted", async () => {
    const fetcher = new YtDlpFetcher({ downloadDir: dir, binaryPath: path.join(binDir, "missing-yt-dlp") });
    const controller = new AbortController();
    controller.abort();

    await expect(fetcher.fetchAudio("https://youtu.be/abc", controller.signal)).rejects.toBeInstanceOf(FetchCancelledError);
  });

  it("wraps a spawn failure in FetchFailedError and leaves no files", async () => {
    const fetcher = new YtDlpFetcher({ downloadDir: dir, binaryPath: path.join(binDir, "missing-yt-dlp") });

    await expect(fetcher.fetchVideo("https://youtu.be/abc", new AbortController().signal)).rejects.toBeInstanceOf(
      FetchFailedError
    );
    await expect(readdir(dir)).resolves.toEqual([]);
  });

  it("returns the finished file and falls back to a default title when yt-dlp reports none", async () => {
    const binaryPath = await writeFakeYtDlp(binDir, '{"title": null, "duration": 12}', 'printf audio > "$base.mp3"');
    const fetcher = new YtDlpFetcher({ downloadDir: dir, binaryPath });

    const result = await fetcher.fetchAudio("https://youtu.be/abc", new AbortController().signal);

    expect(result.title).toBe("Unknown");
    expect(path.dirname(result.filePath)).toBe(dir);
    expect(path.extname(result.filePath)).toBe(".mp3");
    await expect(readdir(dir)).resolves.toEqual([path.basename(result.filePath)]);
  });

  it("kills yt-dlp on abort and removes its partial files", async () => {
    const binaryPath = await writeFakeYtDlp(
      binDir,
      '{"title": "Slow", "duration": 600}',
      'printf partial > "$base.mp3.part"\nexec sleep 30'
    );
    const fetcher = new YtDlpFetcher({ downloadDir: dir, binaryPath });
    const controller = new AbortController();

    const fetching = fetcher.fetchAudio("https://youtu.be/abc", controller.signal);
    const outcome = fetching.catch((error: unknown) => error);

    await vi.waitFor(
      async () => {
        const entries = await readdir(dir);
        expect(entries.some((name) => name.endsWith(".mp3.part"))).toBe(true);
      },
      { timeout: 5000, interval: 50 }
    );

    controller.abort();

    expect(await outcome).toBeInstanceOf(FetchCancelledError);
    await expect(readdir(dir)).resolves.toEqual([]);
  });
});
