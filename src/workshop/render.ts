// ---------------------------------------------------------------------------
// Workshop Rendering – plain-text output lines for the CLI
// ---------------------------------------------------------------------------

import type { Material, MaterialAddResult, Project, Task } from "./types.js";

export const PROJECT_TABLE_HEADER =
  "ID  | Projekt                     | Kunde               | Status  | Termin";
export const PROJECT_TABLE_RULE = "-".repeat(76);

const NAME_WIDTH = 25;
const CUSTOMER_WIDTH = 18;
const STATUS_WIDTH = 7;

// Widths count code points, so astral characters are never split.
function pad(value: string, width: number): string {
  const length = [...value].length;
  return length >= width ? value : value + " ".repeat(width - length);
}

function cell(value: string, width: number): string {
  return pad([...value].slice(0, width).join(""), width);
}

function isSet(value: string | null): value is string {
  return value !== null && value !== "";
}

export function formatQuantity(quantity: number): string {
  return String(quantity);
}

export function projectNotFound(projectId: number): string {
  return `Projekt ${projectId} nicht gefunden.`;
}

// ---------------------------------------------------------------------------
// Projects
// ---------------------------------------------------------------------------

export function renderProjectCreated(project: Project): string {
  return `Projekt ${project.id} angelegt: ${project.name} für ${project.customer}`;
}

export function renderProjectRow(project: Project): string {
  return [
    String(project.id).padStart(3),
    cell(project.name, NAME_WIDTH),
    cell(project.customer, CUSTOMER_WIDTH),
    pad(project.status, STATUS_WIDTH),
    isSet(project.due_date) ? project.due_date : "-",
  ].join(" | ");
}

export function renderProjectTable(projects: Project[]): string[] {
  if (projects.length === 0) {
    return ["Keine Projekte gefunden."];
  }
  return [PROJECT_TABLE_HEADER, PROJECT_TABLE_RULE, ...projects.map(renderProjectRow)];
}

function renderTask(task: Task, index: number): string {
  const due = isSet(task.due_date) ? task.due_date : "-";
  return ` ${String(index).padStart(2)}. [${task.status}] ${task.title} (bis ${due})`;
}

export function renderMaterial(material: Material): string {
  return ` - ${material.name} (${formatQuantity(material.quantity)} ${material.unit})`;
}

export function renderProjectDetail(project: Project): string[] {
  const lines = [`Projekt ${project.id}: ${project.name}`, `Kunde: ${project.customer}`];
  if (isSet(project.address)) {
    lines.push(`Adresse: ${project.address}`);
  }
  if (isSet(project.due_date)) {
    lines.push(`Fällig am: ${project.due_date}`);
  }
  lines.push(`Status: ${project.status}`);
  if (isSet(project.notes)) {
    lines.push(`Notizen: ${project.notes}`);
  }

  lines.push("");
  if (project.tasks.length > 0) {
    lines.push("Aufgaben:", ...project.tasks.map((task, i) => renderTask(task, i + 1)));
  } else {
    lines.push("Keine Aufgaben erfasst.");
  }

  lines.push("");
  if (project.materials.length > 0) {
    lines.push("Materialbedarf:", ...project.materials.map(renderMaterial));
  } else {
    lines.push("Kein Material hinterlegt.");
  }

  return lines;
}

// ---------------------------------------------------------------------------
// Tasks & materials
// ---------------------------------------------------------------------------

export function renderTaskAdded(projectId: number, task: Task): string {
  return `Aufgabe für Projekt ${projectId} gespeichert: ${task.title}`;
}

export function renderMaterialAdded({ material, scope }: MaterialAddResult): string {
  const target = scope.kind === "project" ? `Projekt ${scope.projectId}` : "Lagerbestand";
  return `Material hinzugefügt zu ${target}: ${formatQuantity(material.quantity)} ${material.unit} ${material.name}`;
}

export function renderInventory(inventory: Material[]): string[] {
  if (inventory.length === 0) {
    return ["Kein Lagerbestand erfasst."];
  }
  return ["Lagerbestand:", ...inventory.map(renderMaterial)];
}
