// ---------------------------------------------------------------------------
// WorkshopService – projects, tasks and material needs
// ---------------------------------------------------------------------------
// Dependency-injected and file-backed. Every method reads the whole document,
// and mutating methods write it back only when something changed.
// ---------------------------------------------------------------------------

import {
  findProject,
  nextProjectId,
  readWorkshopStore,
  writeWorkshopStore,
} from "./store.js";
import {
  DEFAULT_STATUS,
  DEFAULT_UNIT,
  type Material,
  type MaterialAddResult,
  type MaterialCreateInput,
  type Project,
  type ProjectCreateInput,
  type ProjectFilter,
  type Task,
  type TaskCreateInput,
} from "./types.js";

// ---------------------------------------------------------------------------
// Dependencies (injected at construction)
// ---------------------------------------------------------------------------

export type WorkshopServiceDeps = {
  storePath: string;
  log: {
    info: (msg: string) => void;
  };
};

// ---------------------------------------------------------------------------
// WorkshopService
// ---------------------------------------------------------------------------

export class WorkshopService {
  constructor(private readonly deps: WorkshopServiceDeps) {}

  // =========================================================================
  // Projects
  // =========================================================================

  async addProject(input: ProjectCreateInput): Promise<Project> {
    const document = await readWorkshopStore(this.deps.storePath);

    const project: Project = {
      id: nextProjectId(document),
      name: input.name,
      customer: input.customer,
      address: input.address ?? null,
      due_date: input.dueDate ?? null,
      status: input.status ?? DEFAULT_STATUS,
      notes: input.notes ?? null,
      tasks: [],
      materials: [],
    };

    document.projects.push(project);
    await writeWorkshopStore(this.deps.storePath, document);

    this.deps.log.info(`project created: ${project.id} — ${project.name}`);
    return project;
  }

  async listProjects(filter?: ProjectFilter): Promise<Project[]> {
    const document = await readWorkshopStore(this.deps.storePath);
    let projects = document.projects;

    if (filter?.status !== undefined) {
      projects = projects.filter((p) => p.status === filter.status);
    }

    return projects;
  }

  async getProject(projectId: number): Promise<Project | null> {
    const document = await readWorkshopStore(this.deps.storePath);
    return findProject(document, projectId);
  }

  // =========================================================================
  // Tasks
  // =========================================================================

  async addTask(projectId: number, input: TaskCreateInput): Promise<Task | null> {
    const document = await readWorkshopStore(this.deps.storePath);
    const project = findProject(document, projectId);
    if (!project) {
      this.deps.log.info(`task not added: project ${projectId} not found`);
      return null;
    }

    const task: Task = {
      title: input.title,
      due_date: input.dueDate ?? null,
      status: input.status ?? DEFAULT_STATUS,
    };

    project.tasks.push(task);
    await writeWorkshopStore(this.deps.storePath, document);

    this.deps.log.info(`task added to project ${project.id}: ${task.title}`);
    return task;
  }

  // =========================================================================
  // Materials
  // =========================================================================

  async addMaterial(input: MaterialCreateInput): Promise<MaterialAddResult | null> {
    const document = await readWorkshopStore(this.deps.storePath);
    const material: Material = {
      name: input.name,
      quantity: input.quantity,
      unit: input.unit ?? DEFAULT_UNIT,
    };

    let result: MaterialAddResult;
    if (input.projectId !== undefined) {
      const project = findProject(document, input.projectId);
      if (!project) {
        this.deps.log.info(`material not added: project ${input.projectId} not found`);
        return null;
      }
      project.materials.push(material);
      result = { material, scope: { kind: "project", projectId: project.id } };
    } else {
      document.inventory.push(material);
      result = { material, scope: { kind: "inventory" } };
    }

    await writeWorkshopStore(this.deps.storePath, document);

    const target = result.scope.kind === "project" ? `project ${result.scope.projectId}` : "inventory";
    this.deps.log.info(`material added to ${target}: ${material.quantity} ${material.unit} ${material.name}`);
    return result;
  }

  async listInventory(): Promise<Material[]> {
    const document = await readWorkshopStore(this.deps.storePath);
    return document.inventory;
  }
}
