import path from "node:path";
import { appendAuditEntry, type SortOutcome } from "./audit.js";
import { errorMessage } from "./errors.js";
import type { Classifier } from "./llm-classify.js";
import { createCategoryFolder, moveImage } from "./move.js";
import { parseReply } from "./reply.js";
import { ensureFolders, listCategoryFolders, listImageFiles } from "./scan.js";

export type SortOptions = {
  intakeDir: string;
  outputDir: string;
  classifier: Classifier;
  /** Classify only; nothing is created or moved. */
  dryRun?: boolean;
  /** JSON-lines audit file; omitted or null disables it. */
  auditLog?: string | null;
};

export type SortResult = {
  image: string;
  outcome: SortOutcome;
  folder: string | null;
  target: string | null;
  reason: string | null;
};

export type SortSummary = {
  processed: number;
  moved: number;
  skipped: number;
  createdFolders: string[];
  results: SortResult[];
};

type RunState = {
  options: SortOptions;
  // Folder names as the classifier sees them; dry runs only grow it in memory
  folders: Set<string>;
  created: string[];
};

type Decision = {
  result: SortResult;
  reply: string | null;
  createdFolder: string | null;
};

async function listOrEmpty(read: () => Promise<string[]>) {
  try {
    return await read();
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return [];
    throw err;
  }
}

async function knownFolders(state: RunState) {
  if (!state.options.dryRun) {
    state.folders = new Set(await listCategoryFolders(state.options.outputDir));
  }
  return [...state.folders].sort();
}

function noteFolder(state: RunState, name: string) {
  state.folders.add(name);
  state.created.push(name);
}

async function addFolder(state: RunState, name: string) {
  const isNew = state.options.dryRun
    ? !state.folders.has(name)
    : await createCategoryFolder(state.options.outputDir, name);
  if (isNew) noteFolder(state, name);
  else state.folders.add(name);
  return isNew;
}

function skip(
  image: string,
  reason: string,
  reply: string | null,
  createdFolder: string | null = null,
): Decision {
  console.error(`  Skipped ${image}: ${reason}`);
  return {
    result: { image, outcome: "skipped", folder: null, target: null, reason },
    reply,
    createdFolder,
  };
}

async function sortOne(state: RunState, image: string): Promise<Decision> {
  const { intakeDir, outputDir, classifier, dryRun } = state.options;
  const imagePath = path.join(intakeDir, image);

  let reply = await classifier.classify(imagePath, await knownFolders(state));
  console.log(`  Model response for ${image}: ${reply}`);
  let parsed = parseReply(image, reply);

  let createdFolder: string | null = null;
  if (parsed.kind === "create_folder") {
    const folder = parsed.folder;
    console.log(`  Model requested creating folder: ${folder}`);
    if (await addFolder(state, folder)) createdFolder = folder;

    // Ask again now that the new folder is one of the options
    try {
      reply = await classifier.classify(imagePath, await knownFolders(state));
    } catch (err) {
      return skip(image, errorMessage(err), reply, createdFolder);
    }
    console.log(`  Model's second response for ${image}: ${reply}`);
    parsed = parseReply(image, reply);
    if (parsed.kind === "create_folder") {
      const reason = `asked to create a second folder "${parsed.folder}"`;
      return skip(image, reason, reply, createdFolder);
    }
  }

  if (parsed.kind === "invalid") {
    return skip(image, `malformed reply (${parsed.reason})`, reply, createdFolder);
  }

  const folder = parsed.folder;
  // Placement into a folder that doesn't exist yet creates it on the way
  const isNewFolder = !state.folders.has(folder);

  if (dryRun) {
    if (isNewFolder) noteFolder(state, folder);
    const target = path.join(outputDir, folder, image);
    console.log(`  Planned: ${image} → ${folder}`);
    return {
      result: { image, outcome: "planned", folder, target, reason: null },
      reply,
      createdFolder,
    };
  }

  let target: string;
  try {
    target = await moveImage(intakeDir, outputDir, image, folder);
  } catch (err) {
    return skip(image, errorMessage(err), reply, createdFolder);
  }
  if (isNewFolder) noteFolder(state, folder);
  return {
    result: { image, outcome: "moved", folder, target, reason: null },
    reply,
    createdFolder,
  };
}

/**
 * Runs one pass over the intake folder. Images are handled one at a time;
 * a failure on one image is logged and leaves it in the intake folder.
 */
export async function sortIntake(options: SortOptions): Promise<SortSummary> {
  const { intakeDir, outputDir, dryRun } = options;

  if (!dryRun) await ensureFolders(intakeDir, outputDir);

  const images = await listOrEmpty(() => listImageFiles(intakeDir));
  const state: RunState = {
    options,
    folders: new Set(await listOrEmpty(() => listCategoryFolders(outputDir))),
    created: [],
  };
  const summary: SortSummary = {
    processed: 0,
    moved: 0,
    skipped: 0,
    createdFolders: state.created,
    results: [],
  };

  if (!images.length) {
    console.log(`No image files found in ${intakeDir}`);
    return summary;
  }

  console.log(`Found ${images.length} image(s) to process${dryRun ? " (dry run)" : ""}`);

  for (const image of images) {
    console.log(`\nProcessing ${image}...`);

    let decision: Decision;
    try {
      decision = await sortOne(state, image);
    } catch (err) {
      decision = skip(image, errorMessage(err), null);
    }

    summary.processed++;
    summary.results.push(decision.result);
    if (decision.result.outcome === "moved") summary.moved++;
    if (decision.result.outcome === "skipped") summary.skipped++;

    if (options.auditLog) {
      try {
        await appendAuditEntry(options.auditLog, {
          image,
          outcome: decision.result.outcome,
          folder: decision.result.folder,
          target: decision.result.target,
          reply: decision.reply,
          createdFolder: decision.createdFolder,
          error: decision.result.reason,
        });
      } catch (err) {
        console.error(`  Audit log write failed for ${image}:`, errorMessage(err));
      }
    }
  }

  console.log(
    `\nProcessing complete: ${summary.moved} moved, ${summary.skipped} skipped` +
      (dryRun ? `, ${summary.processed - summary.skipped} planned` : ""),
  );
  return summary;
}

