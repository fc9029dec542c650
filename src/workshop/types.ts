// ---------------------------------------------------------------------------
// Workshop Types – projects, tasks and materials of a craft business
// ---------------------------------------------------------------------------
// The on-disk schemas accept records with optional keys left out (files may
// be edited by hand); readers normalize them into the explicit types below.
// ---------------------------------------------------------------------------

import { Type, type Static } from "@sinclair/typebox";

export const DEFAULT_STATUS = "offen";
export const DEFAULT_UNIT = "Stk";

// ---------------------------------------------------------------------------
// Stored shapes (validated on load)
// ---------------------------------------------------------------------------

const NullableString = Type.Union([Type.String(), Type.Null()]);

export const StoredTaskSchema = Type.Object({
  title: Type.String(),
  due_date: Type.Optional(NullableString),
  status: Type.Optional(Type.String()),
});

export const StoredMaterialSchema = Type.Object({
  name: Type.String(),
  quantity: Type.Number(),
  unit: Type.Optional(Type.String()),
});

export const StoredProjectSchema = Type.Object({
  id: Type.Integer(),
  name: Type.String(),
  customer: Type.String(),
  address: Type.Optional(NullableString),
  due_date: Type.Optional(NullableString),
  status: Type.Optional(Type.String()),
  notes: Type.Optional(NullableString),
  tasks: Type.Optional(Type.Array(StoredTaskSchema)),
  materials: Type.Optional(Type.Array(StoredMaterialSchema)),
});

export const StoredDocumentSchema = Type.Object({
  projects: Type.Optional(Type.Array(StoredProjectSchema)),
  inventory: Type.Optional(Type.Array(StoredMaterialSchema)),
});

export type StoredTask = Static<typeof StoredTaskSchema>;
export type StoredMaterial = Static<typeof StoredMaterialSchema>;
export type StoredProject = Static<typeof StoredProjectSchema>;
export type StoredDocument = Static<typeof StoredDocumentSchema>;

// ---------------------------------------------------------------------------
// Normalized shapes (what the rest of the app works with)
// ---------------------------------------------------------------------------

export type Task = {
  title: string;
  due_date: string | null;
  status: string;
};

export type Material = {
  name: string;
  quantity: number;
  unit: string;
};

export type Project = {
  id: number;
  name: string;
  customer: string;
  address: string | null;
  due_date: string | null;
  status: string;
  notes: string | null;
  tasks: Task[];
  materials: Material[];
};

export type WorkshopDocument = {
  projects: Project[];
  inventory: Material[];
};

// ---------------------------------------------------------------------------
// Service inputs
// ---------------------------------------------------------------------------

export type ProjectCreateInput = {
  name: string;
  customer: string;
  address?: string;
  dueDate?: string;
  status?: string;
  notes?: string;
};

export type ProjectFilter = {
  status?: string;
};

export type TaskCreateInput = {
  title: string;
  dueDate?: string;
  status?: string;
};

export type MaterialCreateInput = {
  name: string;
  quantity: number;
  unit?: string;
  /** Project scope; inventory when omitted. */
  projectId?: number;
};

export type MaterialScope = { kind: "inventory" } | { kind: "project"; projectId: number };

export type MaterialAddResult = {
  material: Material;
  scope: MaterialScope;
};
