// ---------------------------------------------------------------------------
// Workshop Store – File-based persistence for the workshop document
// ---------------------------------------------------------------------------
// Storage layout:
//   ./handwerk_data.json   – { projects: Project[], inventory: Material[] }
// ---------------------------------------------------------------------------

import { existsSync, mkdirSync } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { Value } from "@sinclair/typebox/value";
import { DataCorruptionError } from "./errors.js";
import {
  DEFAULT_STATUS,
  DEFAULT_UNIT,
  StoredDocumentSchema,
  type Material,
  type Project,
  type StoredDocument,
  type StoredMaterial,
  type StoredProject,
  type StoredTask,
  type Task,
  type WorkshopDocument,
} from "./types.js";

// ---------------------------------------------------------------------------
// Path resolution
// ---------------------------------------------------------------------------

export const DEFAULT_STORE_FILE = "handwerk_data.json";

export function resolveWorkshopStorePath(customPath?: string): string {
  return path.resolve(customPath ?? DEFAULT_STORE_FILE);
}

// ---------------------------------------------------------------------------
// Empty factory function (returns a NEW object each time)
// ---------------------------------------------------------------------------

export function emptyDocument(): WorkshopDocument {
  return { projects: [], inventory: [] };
}

// ---------------------------------------------------------------------------
// Normalization – absent optional fields become null / defaults on read
// ---------------------------------------------------------------------------

function normalizeTask(task: StoredTask): Task {
  return {
    title: task.title,
    due_date: task.due_date ?? null,
    status: task.status ?? DEFAULT_STATUS,
  };
}

function normalizeMaterial(material: StoredMaterial): Material {
  return {
    name: material.name,
    quantity: material.quantity,
    unit: material.unit ?? DEFAULT_UNIT,
  };
}

function normalizeProject(project: StoredProject): Project {
  return {
    id: project.id,
    name: project.name,
    customer: project.customer,
    address: project.address ?? null,
    due_date: project.due_date ?? null,
    status: project.status ?? DEFAULT_STATUS,
    notes: project.notes ?? null,
    tasks: (project.tasks ?? []).map(normalizeTask),
    materials: (project.materials ?? []).map(normalizeMaterial),
  };
}

export function normalizeDocument(stored: StoredDocument): WorkshopDocument {
  return {
    projects: (stored.projects ?? []).map(normalizeProject),
    inventory: (stored.inventory ?? []).map(normalizeMaterial),
  };
}

// ---------------------------------------------------------------------------
// Read / Write
// ---------------------------------------------------------------------------

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export async function readWorkshopStore(filePath: string): Promise<WorkshopDocument> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) {
      return emptyDocument();
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new DataCorruptionError(filePath, "not valid JSON", { cause: err });
  }

  if (!Value.Check(StoredDocumentSchema, parsed)) {
    const first = Value.Errors(StoredDocumentSchema, parsed).First();
    const detail = first ? `${first.path || "/"}: ${first.message}` : "unexpected structure";
    throw new DataCorruptionError(filePath, detail);
  }

  return normalizeDocument(parsed);
}

export async function writeWorkshopStore(
  filePath: string,
  document: WorkshopDocument,
): Promise<void> {
  const dir = path.dirname(filePath);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  const tmpPath = filePath + ".tmp";
  const content = JSON.stringify(document, null, 2) + "\n";
  await fs.writeFile(tmpPath, content, "utf-8");
  await fs.rename(tmpPath, filePath);
}

// ---------------------------------------------------------------------------
// Lookup helpers
// ---------------------------------------------------------------------------

export function nextProjectId(document: WorkshopDocument): number {
  return document.projects.reduce((max, p) => Math.max(max, p.id), 0) + 1;
}

export function findProject(document: WorkshopDocument, projectId: number): Project | null {
  return document.projects.find((p) => p.id === projectId) ?? null;
}
