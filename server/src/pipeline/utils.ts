import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";

export function nowIso(): string {
  return new Date().toISOString();
}

export function repoRoot(): string {
  // This file lives at server/src/pipeline/utils.ts
  // repo root is three levels up: pipeline -> src -> server -> repo
  const here = path.dirname(fileURLToPath(import.meta.url));
  return path.resolve(here, "../../..");
}

function dirFromEnv(name: string, fallback: string): string {
  const env = process.env[name];
  if (env && env.trim().length > 0) return path.resolve(env.trim());
  return path.join(repoRoot(), fallback);
}

export function outputRootAbs(): string {
  return dirFromEnv("CDX_OUTPUT_DIR", "output");
}

export function dataRootAbs(): string {
  return dirFromEnv("CDX_DATA_DIR", "data");
}

export function configRootAbs(): string {
  return dirFromEnv("CDX_CONFIG_DIR", "config");
}

export function runOutputDirAbs(runId: string): string {
  return path.join(outputRootAbs(), runId);
}

export function batchesRootAbs(): string {
  return path.join(outputRootAbs(), "_batches");
}

export function batchDirAbs(batchId: string): string {
  return path.join(batchesRootAbs(), batchId);
}

export function artifactAbsPath(runId: string, name: string): string {
  return path.join(runOutputDirAbs(runId), name);
}

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

let writeSeq = 0;

async function atomicWrite(filePath: string, data: string | Buffer): Promise<void> {
  await ensureDir(path.dirname(filePath));
  const tmpPath = `${filePath}.tmp.${process.pid}.${Date.now()}.${++writeSeq}`;
  await fs.writeFile(tmpPath, data);
  await fs.rename(tmpPath, filePath);
}

export async function writeTextFile(filePath: string, text: string): Promise<void> {
  const out = text.endsWith("\n") ? text : `${text}\n`;
  await atomicWrite(filePath, out);
}

export async function writeJsonFile(filePath: string, obj: unknown): Promise<void> {
  await atomicWrite(filePath, `${JSON.stringify(obj, null, 2)}\n`);
}

export async function readJsonFile<T>(filePath: string): Promise<T> {
  const raw = await fs.readFile(filePath, "utf8");
  return JSON.parse(raw) as T;
}

export async function tryReadJsonFile<T>(filePath: string): Promise<T | null> {
  try {
    return await readJsonFile<T>(filePath);
  } catch {
    return null;
  }
}

export function isSafeArtifactName(name: string): boolean {
  // Prevent path traversal and keep filenames predictable.
  if (name.includes("/") || name.includes("\\") || name.includes("..")) return false;
  return /^[A-Za-z0-9._-]+$/.test(name);
}

export function slug(input: string): string {
  const s = input
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
  return s.slice(0, 60) || "untitled";
}

/** FNV-1a, 32-bit. Stable across processes, so ids derived from it survive reruns. */
export function hash32(input: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < input.length; i++) {
    h ^= input.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function round(value: number, digits = 4): number {
  const f = 10 ** digits;
  return Math.round(value * f) / f;
}

/** Abortable sleep. Rejects with the provided error factory's result when the signal fires. */
export function wait(ms: number, signal: AbortSignal, onAbort: () => Error): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(onAbort());
      return;
    }
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", abortListener);
      resolve();
    }, ms);
    const abortListener = () => {
      clearTimeout(timer);
      reject(onAbort());
    };
    signal.addEventListener("abort", abortListener, { once: true });
  });
}
