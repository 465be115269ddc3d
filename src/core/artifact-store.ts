/*
Purpose: per-build log and artifact storage, addressed by build id (never by workspace slot).
Layout: <root>/<build-id>/{build.log, files/, manifest.json, .sealed}
Once sealed, a build's storage accepts no further writes.
*/

import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";
import { z } from "zod";

import { ArtifactStoreError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export interface LogWriter {
  readonly buildId: string;
  // Returns false once the writer is closed; late output is dropped.
  write(chunk: string | Uint8Array): boolean;
  close(): Promise<void>;
}

const ManifestSchema = z
  .object({
    primary: z.string().min(1),
    files: z.array(z.string().min(1)).min(1),
  })
  .strict();

export type ArtifactManifest = z.infer<typeof ManifestSchema>;

const LOG_FILE = "build.log";
const FILES_DIR = "files";
const MANIFEST_FILE = "manifest.json";
const SEALED_MARKER = ".sealed";

// =============================================================================
// STORE
// =============================================================================

export class ArtifactStore {
  constructor(public readonly root: string) {}

  logRef(buildId: string): string {
    return `${buildId}/${LOG_FILE}`;
  }

  logPath(buildId: string): string {
    return path.join(this.buildDir(buildId), LOG_FILE);
  }

  hasLog(buildId: string): boolean {
    return fs.existsSync(this.logPath(buildId));
  }

  openLogWriter(buildId: string): LogWriter {
    this.assertWritableSync(buildId);
    fse.ensureDirSync(this.buildDir(buildId));
    return new FileLogWriter(buildId, this.logPath(buildId));
  }

  async putArtifact(buildId: string, file: string): Promise<string> {
    await this.assertWritable(buildId);

    const name = path.basename(file);
    const dest = path.join(this.buildDir(buildId), FILES_DIR, name);
    try {
      await fse.copy(file, dest, { overwrite: true });
    } catch (err) {
      throw new ArtifactStoreError(`Failed to store artifact ${file} for build ${buildId}`, err);
    }

    const manifest = await this.readManifest(buildId);
    const next: ArtifactManifest = manifest
      ? {
          primary: manifest.primary,
          files: manifest.files.includes(name) ? manifest.files : [...manifest.files, name],
        }
      : { primary: name, files: [name] };
    await fse.outputJson(this.manifestPath(buildId), next, { spaces: 2 });

    return `${buildId}/${name}`;
  }

  async listArtifacts(buildId: string): Promise<string[]> {
    const manifest = await this.readManifest(buildId);
    return manifest ? [...manifest.files] : [];
  }

  // Returns the primary artifact unless a file name is given.
  async getArtifact(buildId: string, name?: string): Promise<Buffer | null> {
    const manifest = await this.readManifest(buildId);
    if (!manifest) return null;

    const fileName = name ?? manifest.primary;
    if (!manifest.files.includes(fileName)) return null;

    const filePath = path.join(this.buildDir(buildId), FILES_DIR, fileName);
    if (!(await fse.pathExists(filePath))) return null;
    return fse.readFile(filePath);
  }

  async getLog(buildId: string, opts: { tail?: number } = {}): Promise<string | null> {
    const logPath = this.logPath(buildId);
    if (!(await fse.pathExists(logPath))) return null;

    const content = await fse.readFile(logPath, "utf8");
    return opts.tail === undefined ? content : tailLines(content, opts.tail);
  }

  async seal(buildId: string): Promise<void> {
    await fse.ensureDir(this.buildDir(buildId));
    await fse.outputFile(path.join(this.buildDir(buildId), SEALED_MARKER), "");
  }

  async isSealed(buildId: string): Promise<boolean> {
    return fse.pathExists(path.join(this.buildDir(buildId), SEALED_MARKER));
  }

  async remove(buildId: string): Promise<void> {
    await fse.remove(this.buildDir(buildId));
  }

  private buildDir(buildId: string): string {
    if (buildId.length === 0 || buildId.includes("/") || buildId.includes("\\") || buildId.startsWith(".")) {
      throw new ArtifactStoreError(`Invalid build id for artifact storage: ${JSON.stringify(buildId)}`);
    }
    return path.join(this.root, buildId);
  }

  private manifestPath(buildId: string): string {
    return path.join(this.buildDir(buildId), MANIFEST_FILE);
  }

  private async readManifest(buildId: string): Promise<ArtifactManifest | null> {
    const manifestPath = this.manifestPath(buildId);
    if (!(await fse.pathExists(manifestPath))) return null;

    const parsed = ManifestSchema.safeParse(await fse.readJson(manifestPath));
    if (!parsed.success) {
      throw new ArtifactStoreError(`Invalid artifact manifest at ${manifestPath}`, parsed.error);
    }
    return parsed.data;
  }

  private async assertWritable(buildId: string): Promise<void> {
    if (await this.isSealed(buildId)) {
      throw new ArtifactStoreError(`Storage for build ${buildId} is sealed.`);
    }
  }

  private assertWritableSync(buildId: string): void {
    if (fs.existsSync(path.join(this.buildDir(buildId), SEALED_MARKER))) {
      throw new ArtifactStoreError(`Storage for build ${buildId} is sealed.`);
    }
  }
}

// =============================================================================
// LOG WRITER
// =============================================================================

class FileLogWriter implements LogWriter {
  private readonly stream: fs.WriteStream;
  private closing: Promise<void> | null = null;
  private failure: Error | null = null;

  constructor(
    public readonly buildId: string,
    filePath: string,
  ) {
    this.stream = fs.createWriteStream(filePath, { flags: "a" });
    this.stream.on("error", (err) => {
      this.failure = err;
    });
  }

  write(chunk: string | Uint8Array): boolean {
    if (this.closing || this.failure) return false;
    this.stream.write(chunk);
    return true;
  }

  close(): Promise<void> {
    if (!this.closing) {
      this.closing = new Promise<void>((resolve, reject) => {
        this.stream.end(() => {
          if (this.failure) {
            reject(new ArtifactStoreError(`Log for build ${this.buildId} failed to write`, this.failure));
            return;
          }
          resolve();
        });
      });
    }
    return this.closing;
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

export function tailLines(content: string, count: number): string {
  if (count <= 0 || content.length === 0) return "";

  const endsWithNewline = content.endsWith("\n");
  const body = endsWithNewline ? content.slice(0, -1) : content;
  const lines = body.split("\n");
  const tail = lines.slice(-count).join("\n");
  return endsWithNewline ? `${tail}\n` : tail;
}
