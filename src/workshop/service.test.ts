// ---------------------------------------------------------------------------
// WorkshopService – Tests
// ---------------------------------------------------------------------------

import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { DataCorruptionError } from "./errors.js";
import { WorkshopService } from "./service.js";
import { readWorkshopStore } from "./store.js";

let tmpDir: string;

function createTestService(dir: string) {
  const storePath = path.join(dir, "handwerk_data.json");
  const logs: string[] = [];
  const service = new WorkshopService({
    storePath,
    log: { info: (msg) => logs.push(msg) },
  });
  return { service, logs, storePath };
}

beforeEach(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "workshop-svc-"));
});

afterEach(async () => {
  await fs.rm(tmpDir, { recursive: true, force: true });
});

// ---------------------------------------------------------------------------
// addProject
// ---------------------------------------------------------------------------

describe("addProject", () => {
  it("creates a project with defaults", async () => {
    const { service } = createTestService(tmpDir);
    const project = await service.addProject({ name: "Dach", customer: "Müller" });

    expect(project).toEqual({
      id: 1,
      name: "Dach",
      customer: "Müller",
      address: null,
      due_date: null,
      status: "offen",
      notes: null,
      tasks: [],
      materials: [],
    });
  });

  it("stores all optional fields", async () => {
    const { service } = createTestService(tmpDir);
    const project = await service.addProject({
      name: "Bad",
      customer: "Schmidt",
      address: "Ringstraße 2",
      dueDate: "2024-06-15",
      status: "geplant",
      notes: "Fliesen aussuchen",
    });

    expect(project.address).toBe("Ringstraße 2");
    expect(project.due_date).toBe("2024-06-15");
    expect(project.status).toBe("geplant");
    expect(project.notes).toBe("Fliesen aussuchen");
  });

  it("accepts empty strings", async () => {
    const { service } = createTestService(tmpDir);
    const project = await service.addProject({ name: "", customer: "", address: "" });

    expect(project.name).toBe("");
    expect(project.address).toBe("");
  });

  it("assigns strictly increasing ids starting at 1", async () => {
    const { service } = createTestService(tmpDir);
    const ids: number[] = [];
    for (const name of ["A", "B", "C", "D"]) {
      ids.push((await service.addProject({ name, customer: "K" })).id);
    }
    expect(ids).toEqual([1, 2, 3, 4]);
  });

  it("continues after the highest stored id", async () => {
    const { service, storePath } = createTestService(tmpDir);
    await fs.writeFile(
      storePath,
      JSON.stringify({
        projects: [{ id: 9, name: "Alt", customer: "K" }],
        inventory: [],
      }),
      "utf-8",
    );

    const project = await service.addProject({ name: "Neu", customer: "K" });
    expect(project.id).toBe(10);
  });

  it("persists the project", async () => {
    const { service, storePath } = createTestService(tmpDir);
    const project = await service.addProject({ name: "Persisted", customer: "K" });

    const doc = await readWorkshopStore(storePath);
    expect(doc.projects).toEqual([project]);
  });

  it("logs project creation", async () => {
    const { service, logs } = createTestService(tmpDir);
    await service.addProject({ name: "Log Test", customer: "K" });

    expect(logs).toEqual(["project created: 1 — Log Test"]);
  });
});

// ---------------------------------------------------------------------------
// listProjects / getProject
// ---------------------------------------------------------------------------

describe("listProjects", () => {
  it("returns an empty list when no file exists", async () => {
    const { service } = createTestService(tmpDir);
    expect(await service.listProjects()).toEqual([]);
  });

  it("returns all projects in insertion order", async () => {
    const { service } = createTestService(tmpDir);
    await service.addProject({ name: "A", customer: "K" });
    await service.addProject({ name: "B", customer: "K" });

    const projects = await service.listProjects();
    expect(projects.map((p) => p.name)).toEqual(["A", "B"]);
  });

  it("filters by exact, case-sensitive status and keeps order", async () => {
    const { service } = createTestService(tmpDir);
    await service.addProject({ name: "A", customer: "K", status: "erledigt" });
    await service.addProject({ name: "B", customer: "K" });
    await service.addProject({ name: "C", customer: "K", status: "Erledigt" });
    await service.addProject({ name: "D", customer: "K", status: "erledigt" });

    const projects = await service.listProjects({ status: "erledigt" });
    expect(projects.map((p) => p.name)).toEqual(["A", "D"]);
  });

  it("returns nothing when no project has the status", async () => {
    const { service } = createTestService(tmpDir);
    await service.addProject({ name: "A", customer: "K" });

    expect(await service.listProjects({ status: "pausiert" })).toEqual([]);
  });
});

describe("getProject", () => {
  it("returns the project by id", async () => {
    const { service } = createTestService(tmpDir);
    await service.addProject({ name: "A", customer: "K" });
    await service.addProject({ name: "B", customer: "K" });

    expect((await service.getProject(2))?.name).toBe("B");
  });

  it("returns null for an unknown id", async () => {
    const { service } = createTestService(tmpDir);
    expect(await service.getProject(42)).toBeNull();
  });
});

// ---------------------------------------------------------------------------
// addTask
// ---------------------------------------------------------------------------

describe("addTask", () => {
  it("appends tasks to the project in order", async () => {
    const { service } = createTestService(tmpDir);
    await service.addProject({ name: "Dach", customer: "Müller" });

    await service.addTask(1, { title: "Gerüst", dueDate: "2024-04-20" });
    await service.addTask(1, { title: "Ziegel", status: "erledigt" });

    const project = await service.getProject(1);
    expect(project?.tasks).toEqual([
      { title: "Gerüst", due_date: "2024-04-20", status: "offen" },
      { title: "Ziegel", due_date: null, status: "erledigt" },
    ]);
  });

  it("returns null and leaves the file unchanged for an unknown project", async () => {
    const { service, storePath, logs } = createTestService(tmpDir);
    await service.addProject({ name: "Dach", customer: "Müller" });
    const before = await fs.readFile(storePath);
    const statBefore = await fs.stat(storePath);

    const result = await service.addTask(5, { title: "Nichts" });

    expect(result).toBeNull();
    expect(await fs.readFile(storePath)).toEqual(before);
    expect((await fs.stat(storePath)).mtimeMs).toBe(statBefore.mtimeMs);
    expect(logs).toContain("task not added: project 5 not found");
  });

  it("does not create a data file for an unknown project", async () => {
    const { service, storePath } = createTestService(tmpDir);

    expect(await service.addTask(1, { title: "Nichts" })).toBeNull();
    await expect(fs.access(storePath)).rejects.toThrow();
  });
});

// ---------------------------------------------------------------------------
// addMaterial / listInventory
// ---------------------------------------------------------------------------

describe("addMaterial", () => {
  it("adds to the inventory when no project is given", async () => {
    const { service } = createTestService(tmpDir);
    await service.addProject({ name: "Dach", customer: "Müller" });

    const result = await service.addMaterial({ name: "Schrauben", quantity: 100 });

    expect(result).toEqual({
      material: { name: "Schrauben", quantity: 100, unit: "Stk" },
      scope: { kind: "inventory" },
    });
    expect(await service.listInventory()).toEqual([{ name: "Schrauben", quantity: 100, unit: "Stk" }]);
    expect((await service.getProject(1))?.materials).toEqual([]);
  });

  it("adds to the project only when a project id is given", async () => {
    const { service } = createTestService(tmpDir);
    await service.addProject({ name: "Dach", customer: "Müller" });

    const result = await service.addMaterial({
      name: "Dachlatte",
      quantity: 12.5,
      unit: "m",
      projectId: 1,
    });

    expect(result?.scope).toEqual({ kind: "project", projectId: 1 });
    expect((await service.getProject(1))?.materials).toEqual([
      { name: "Dachlatte", quantity: 12.5, unit: "m" },
    ]);
    expect(await service.listInventory()).toEqual([]);
  });

  it("accepts zero and negative quantities", async () => {
    const { service } = createTestService(tmpDir);
    await service.addMaterial({ name: "Rückgabe", quantity: -4 });
    await service.addMaterial({ name: "Leer", quantity: 0 });

    const inventory = await service.listInventory();
    expect(inventory.map((m) => m.quantity)).toEqual([-4, 0]);
  });

  it("returns null and leaves the file unchanged for an unknown project", async () => {
    const { service, storePath } = createTestService(tmpDir);
    await service.addProject({ name: "Dach", customer: "Müller" });
    const before = await fs.readFile(storePath);

    const result = await service.addMaterial({ name: "Nägel", quantity: 1, projectId: 3 });

    expect(result).toBeNull();
    expect(await fs.readFile(storePath)).toEqual(before);
  });

  it("treats project id 0 as a project reference", async () => {
    const { service } = createTestService(tmpDir);

    expect(await service.addMaterial({ name: "Nägel", quantity: 1, projectId: 0 })).toBeNull();
    expect(await service.listInventory()).toEqual([]);
  });
});

describe("listInventory", () => {
  it("returns an empty list when nothing is stocked", async () => {
    const { service } = createTestService(tmpDir);
    expect(await service.listInventory()).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// Corrupt data
// ---------------------------------------------------------------------------

describe("corrupt data file", () => {
  it("propagates DataCorruptionError and does not overwrite the file", async () => {
    const { service, storePath } = createTestService(tmpDir);
    await fs.writeFile(storePath, "kaputt", "utf-8");

    await expect(service.addProject({ name: "A", customer: "K" })).rejects.toBeInstanceOf(
      DataCorruptionError,
    );
    expect(await fs.readFile(storePath, "utf-8")).toBe("kaputt");
  });
});
