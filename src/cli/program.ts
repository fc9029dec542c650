// ---------------------------------------------------------------------------
// Werkbank CLI – command tree
// ---------------------------------------------------------------------------
//   werkbank [--data <path>] [--verbose]
//     project add <name> <customer> [--address] [--due-date] [--status] [--notes]
//     project list [--status]
//     project detail <project_id>
//     task add <project_id> <title> [--due-date] [--status]
//     material add <name> <quantity> [--unit] [--project-id]
//     inventory list
// ---------------------------------------------------------------------------

import { Command, InvalidArgumentError } from "commander";
import { loadConfig, type GlobalCliOptions, type WerkbankConfig } from "../config/config.js";
import { configureLogging, getChildLogger } from "../logging.js";
import {
  projectNotFound,
  renderInventory,
  renderMaterialAdded,
  renderProjectCreated,
  renderProjectDetail,
  renderProjectTable,
  renderTaskAdded,
} from "../workshop/render.js";
import { WorkshopService } from "../workshop/service.js";
import { DEFAULT_STATUS, DEFAULT_UNIT } from "../workshop/types.js";

export type CliIo = {
  /** One line of command output (stdout). */
  out: (line: string) => void;
  /** Raw chunk for usage errors and logs (stderr). */
  err: (chunk: string) => void;
};

export type CliDeps = {
  io: CliIo;
  createService?: (config: WerkbankConfig) => WorkshopService;
};

type ProjectAddOptions = {
  address?: string;
  dueDate?: string;
  status: string;
  notes?: string;
};

type ProjectListOptions = {
  status?: string;
};

type TaskAddOptions = {
  dueDate?: string;
  status: string;
};

type MaterialAddOptions = {
  unit: string;
  projectId?: number;
};

// ---------------------------------------------------------------------------
// Argument coercion
// ---------------------------------------------------------------------------

export function parseInteger(value: string): number {
  const trimmed = value.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`Keine ganze Zahl: '${value}'.`);
  }
  return Number.parseInt(trimmed, 10);
}

export function parseDecimal(value: string): number {
  const trimmed = value.trim();
  const parsed = Number(trimmed);
  if (trimmed === "" || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError(`Keine Zahl: '${value}'.`);
  }
  return parsed;
}

function createDefaultService(config: WerkbankConfig): WorkshopService {
  const logger = getChildLogger({ module: "workshop" });
  return new WorkshopService({
    storePath: config.storePath,
    log: { info: (msg) => logger.info(msg) },
  });
}

// ---------------------------------------------------------------------------
// Program
// ---------------------------------------------------------------------------

export function buildProgram(deps: CliDeps): Command {
  const { io } = deps;
  const createService = deps.createService ?? createDefaultService;
  let service: WorkshopService | undefined;

  const program = new Command();
  program
    .name("werkbank")
    .description("Werkzeug für Handwerksbetriebe")
    .version("0.1.0")
    .exitOverride()
    .configureOutput({
      writeOut: (str) => io.out(str.replace(/\n$/, "")),
      writeErr: (str) => io.err(str),
    })
    .option("--data <path>", "Pfad der Datendatei (Standard: ./handwerk_data.json)")
    .option("--verbose", "Ausführliche Protokollausgabe")
    .hook("preAction", () => {
      const config = loadConfig(program.opts<GlobalCliOptions>());
      configureLogging({ verbose: config.verbose, write: io.err });
      service = createService(config);
    });

  const workshop = (): WorkshopService => {
    if (!service) {
      throw new Error("workshop service requested before option parsing");
    }
    return service;
  };

  // Projektbefehle
  const project = program.command("project").description("Projekte verwalten");

  project
    .command("add")
    .description("Neues Projekt anlegen")
    .argument("<name>", "Name des Projekts")
    .argument("<customer>", "Auftraggeber")
    .option("--address <address>", "Adresse der Baustelle")
    .option("--due-date <date>", "Geplanter Abschlusstermin (YYYY-MM-DD)")
    .option("--status <status>", "Status, z.B. offen oder erledigt", DEFAULT_STATUS)
    .option("--notes <notes>", "Kurznotiz zum Projekt")
    .action(async (name: string, customer: string, opts: ProjectAddOptions) => {
      const created = await workshop().addProject({
        name,
        customer,
        address: opts.address,
        dueDate: opts.dueDate,
        status: opts.status,
        notes: opts.notes,
      });
      io.out(renderProjectCreated(created));
    });

  project
    .command("list")
    .description("Projekte anzeigen")
    .option("--status <status>", "Nach Status filtern")
    .action(async (opts: ProjectListOptions) => {
      const projects = await workshop().listProjects({ status: opts.status });
      renderProjectTable(projects).forEach((line) => io.out(line));
    });

  project
    .command("detail")
    .description("Details zu einem Projekt")
    .argument("<project_id>", "Projekt-ID", parseInteger)
    .action(async (projectId: number) => {
      const found = await workshop().getProject(projectId);
      if (!found) {
        io.out(projectNotFound(projectId));
        return;
      }
      renderProjectDetail(found).forEach((line) => io.out(line));
    });

  // Aufgaben
  const task = program.command("task").description("Aufgaben verwalten");

  task
    .command("add")
    .description("Aufgabe zu Projekt hinzufügen")
    .argument("<project_id>", "Projekt-ID", parseInteger)
    .argument("<title>", "Aufgabenbeschreibung")
    .option("--due-date <date>", "Fälligkeitsdatum (YYYY-MM-DD)")
    .option("--status <status>", "Status, z.B. offen oder erledigt", DEFAULT_STATUS)
    .action(async (projectId: number, title: string, opts: TaskAddOptions) => {
      const added = await workshop().addTask(projectId, {
        title,
        dueDate: opts.dueDate,
        status: opts.status,
      });
      io.out(added ? renderTaskAdded(projectId, added) : projectNotFound(projectId));
    });

  // Material
  const material = program.command("material").description("Materialbedarf erfassen");

  material
    .command("add")
    .description("Material hinzufügen")
    .argument("<name>", "Materialbezeichnung")
    .argument("<quantity>", "Menge", parseDecimal)
    .option("--unit <unit>", "Einheit (z.B. Stk, m, kg)", DEFAULT_UNIT)
    .option("--project-id <id>", "Projekt-ID für projektbezogenen Bedarf", parseInteger)
    .action(async (name: string, quantity: number, opts: MaterialAddOptions) => {
      const added = await workshop().addMaterial({
        name,
        quantity,
        unit: opts.unit,
        projectId: opts.projectId,
      });
      if (added) {
        io.out(renderMaterialAdded(added));
      } else if (opts.projectId !== undefined) {
        io.out(projectNotFound(opts.projectId));
      }
    });

  // Lagerbestand
  const inventory = program.command("inventory").description("Lagerbestand anzeigen");

  inventory
    .command("list")
    .description("Lagerbestand listen")
    .action(async () => {
      const items = await workshop().listInventory();
      renderInventory(items).forEach((line) => io.out(line));
    });

  return program;
}
