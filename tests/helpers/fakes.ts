import { mkdtemp, rm, truncate, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { vi } from "vitest";
import type { ChatTransport, DownloadResult, MediaFetcher } from "../../src/types/delivery.js";

export async function makeTempDir(): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), "tube-courier-test-"));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/** Writes a sparse file of the given size. */
export async function writeArtifact(filePath: string, sizeBytes: number): Promise<string> {
  await writeFile(filePath, "");
  await truncate(filePath, sizeBytes);
  return filePath;
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

export function deferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

export function createTransport() {
  const texts: string[] = [];
  const transport = {
    texts,
    sendText: vi.fn(async (_userId: number, text: string) => {
      texts.push(text);
    }),
    sendAudio: vi.fn(async (_userId: number, _filePath: string, _caption: string) => {}),
    sendVideo: vi.fn(async (_userId: number, _filePath: string, _caption: string) => {}),
  } satisfies ChatTransport & { texts: string[] };
  return transport;
}

type FetchImpl = (url: string, signal: AbortSignal) => Promise<DownloadResult>;

export function createFetcher(impl: FetchImpl) {
  return {
    fetchAudio: vi.fn(impl),
    fetchVideo: vi.fn(impl),
  } satisfies MediaFetcher;
}

export function silenceConsole(): void {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
}
