/*
Purpose: read-only feature metadata per (vehicle, version, board).
Assumptions: the catalog file is produced elsewhere (release refresh job) and may be
replaced at any time; it is re-read whenever its mtime changes.
*/

import fse from "fs-extra";
import yaml from "js-yaml";
import { z } from "zod";

import { formatIssues } from "./config-loader.js";
import { CatalogUnavailableError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

const FeatureSchema = z
  .object({
    id: z.string().min(1),
    category: z.string().optional(),
    description: z.string().optional(),
    default: z.boolean().default(false),
    requires: z.array(z.string().min(1)).default([]),
  })
  .strict();

const VersionSchema = z
  .object({
    // Git ref (tag, branch or commit) the version builds from.
    ref: z.string().min(1),
    boards: z.array(z.string().min(1)).min(1),
    features: z.array(FeatureSchema).default([]),
    conflicts: z.array(z.tuple([z.string().min(1), z.string().min(1)])).default([]),
  })
  .strict();

const VehicleSchema = z
  .object({
    name: z.string().min(1).optional(),
    versions: z.record(VersionSchema),
  })
  .strict();

export const CatalogDocumentSchema = z
  .object({
    vehicles: z.record(VehicleSchema),
  })
  .strict();

export type FeatureSpec = z.infer<typeof FeatureSchema>;
export type CatalogDocument = z.infer<typeof CatalogDocumentSchema>;

export type CatalogTarget = {
  vehicle: string;
  version: string;
  board: string;
  ref: string;
  features: FeatureSpec[];
  conflicts: Array<[string, string]>;
};

export type CatalogKey = {
  vehicle: string;
  version: string;
  board: string;
};

export type CatalogLookup =
  | { found: true; target: CatalogTarget }
  | { found: false; reason: string };

export interface FeatureCatalog {
  // Throws CatalogUnavailableError when the catalog cannot be read at all.
  lookup(key: CatalogKey): Promise<CatalogLookup>;
}

// =============================================================================
// IN-MEMORY CATALOG
// =============================================================================

export class StaticFeatureCatalog implements FeatureCatalog {
  private readonly doc: CatalogDocument;

  constructor(doc: unknown) {
    this.doc = parseCatalogDocument(doc, "<inline>");
  }

  async lookup(key: CatalogKey): Promise<CatalogLookup> {
    return lookupInDocument(this.doc, key);
  }
}

// =============================================================================
// FILE-BACKED CATALOG
// =============================================================================

export class FileFeatureCatalog implements FeatureCatalog {
  private cached: { mtimeMs: number; doc: CatalogDocument } | null = null;

  constructor(public readonly filePath: string) {}

  async lookup(key: CatalogKey): Promise<CatalogLookup> {
    const doc = await this.read();
    return lookupInDocument(doc, key);
  }

  async read(): Promise<CatalogDocument> {
    let mtimeMs: number;
    try {
      mtimeMs = (await fse.stat(this.filePath)).mtimeMs;
    } catch (err) {
      throw new CatalogUnavailableError(`Feature catalog not readable at ${this.filePath}`, err);
    }

    if (this.cached && this.cached.mtimeMs === mtimeMs) {
      return this.cached.doc;
    }

    let raw: string;
    let doc: unknown;
    try {
      raw = await fse.readFile(this.filePath, "utf8");
      doc = yaml.load(raw);
    } catch (err) {
      throw new CatalogUnavailableError(`Failed to read feature catalog at ${this.filePath}`, err);
    }

    const parsed = parseCatalogDocument(doc, this.filePath);
    this.cached = { mtimeMs, doc: parsed };
    return parsed;
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function parseCatalogDocument(doc: unknown, source: string): CatalogDocument {
  const parsed = CatalogDocumentSchema.safeParse(doc);
  if (!parsed.success) {
    throw new CatalogUnavailableError(
      `Invalid feature catalog at ${source}:\n${formatIssues(parsed.error.issues)}`,
      parsed.error,
    );
  }
  return parsed.data;
}

function lookupInDocument(doc: CatalogDocument, key: CatalogKey): CatalogLookup {
  const vehicleId = key.vehicle.toLowerCase();
  const vehicle = Object.entries(doc.vehicles).find(([id]) => id.toLowerCase() === vehicleId)?.[1];
  if (!vehicle) {
    return { found: false, reason: `Unknown vehicle ${key.vehicle}.` };
  }

  const version = Object.hasOwn(vehicle.versions, key.version) ? vehicle.versions[key.version] : undefined;
  if (!version) {
    return { found: false, reason: `Unknown version ${key.version} for vehicle ${key.vehicle}.` };
  }

  if (!version.boards.includes(key.board)) {
    return {
      found: false,
      reason: `Board ${key.board} is not available for ${key.vehicle} ${key.version}.`,
    };
  }

  return {
    found: true,
    target: {
      vehicle: vehicleId,
      version: key.version,
      board: key.board,
      ref: version.ref,
      features: version.features,
      conflicts: version.conflicts,
    },
  };
}
