import express from "express";
import multer from "multer";
import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { SorterConfig } from "../core/config.js";
import { errorMessage } from "../core/errors.js";
import type { Classifier } from "../core/llm-classify.js";
import { freeTargetPath } from "../core/move.js";
import {
  IMAGE_EXTENSIONS,
  isImageFile,
  listCategoryFolders,
  listImageFiles,
} from "../core/scan.js";
import { sortIntake } from "../core/sorter.js";

export type AppDeps = {
  config: Pick<SorterConfig, "intakeDir" | "outputDir" | "auditLog">;
  classifier: Classifier;
};

const SortRequestSchema = z.object({ dryRun: z.boolean().optional() });

// busboy hands multipart file names over as latin1; re-read them as UTF-8
// unless that yields invalid sequences (already decoded)
export function uploadName(originalName: string) {
  const utf8 = Buffer.from(originalName, "latin1").toString("utf8");
  return path.basename(utf8.includes("\uFFFD") ? originalName : utf8);
}

export function createApp({ config, classifier }: AppDeps) {
  const app = express();
  app.use(express.json());

  // Uploads land in the intake folder under their own names
  const upload = multer({
    storage: multer.diskStorage({
      destination: (_req, _file, cb) => {
        void fs.mkdir(config.intakeDir, { recursive: true }).then(
          () => cb(null, config.intakeDir),
          (err: Error) => cb(err, config.intakeDir),
        );
      },
      filename: (_req, file, cb) => {
        void freeTargetPath(config.intakeDir, uploadName(file.originalname)).then(
          (target) => cb(null, path.basename(target)),
          (err: Error) => cb(err, ""),
        );
      },
    }),
    fileFilter: (_req, file, cb) => {
      const name = uploadName(file.originalname);
      if (isImageFile(name)) {
        cb(null, true);
      } else {
        cb(
          new Error(
            `${name} is not an image (${IMAGE_EXTENSIONS.join(", ")})`,
          ),
        );
      }
    },
  });

  let sorting = false;

  app.get("/api/intake", async (_req, res) => {
    try {
      await fs.mkdir(config.intakeDir, { recursive: true });
      res.json({ files: await listImageFiles(config.intakeDir) });
    } catch (err) {
      console.error(err);
      res.status(500).json({ error: "Could not read intake folder" });
    }
  });

  app.get("/api/folders", async (_req, res) => {
    try {
      await fs.mkdir(config.outputDir, { recursive: true });
      res.json({ folders: await listCategoryFolders(config.outputDir) });
    } catch (err) {
      console.error(err);
      res.status(500).json({ error: "Could not read output folder" });
    }
  });

  // API: Upload images into the intake folder
  app.post("/api/upload", (req, res) => {
    upload.array("files", 50)(req, res, (err?: unknown) => {
      if (err) {
        res.status(400).json({ error: errorMessage(err) });
        return;
      }
      const files = Array.isArray(req.files) ? req.files : [];
      if (!files.length) {
        res.status(400).json({ error: "No files uploaded" });
        return;
      }
      console.log(`Received ${files.length} file(s) into ${config.intakeDir}`);
      res.json({ files: files.map((f) => f.filename) });
    });
  });

  // API: Run one sort pass over the intake folder
  app.post("/api/sort", async (req, res) => {
    const body = SortRequestSchema.safeParse(req.body ?? {});
    if (!body.success) {
      res.status(400).json({ error: "Expected { dryRun?: boolean }" });
      return;
    }
    if (sorting) {
      res.status(409).json({ error: "A sort is already running" });
      return;
    }

    sorting = true;
    try {
      const dryRun = body.data.dryRun ?? false;
      const summary = await sortIntake({
        intakeDir: config.intakeDir,
        outputDir: config.outputDir,
        classifier,
        dryRun,
        auditLog: dryRun ? null : config.auditLog,
      });
      res.json(summary);
    } catch (err) {
      console.error(err);
      res.status(500).json({ error: "Sort failed" });
    } finally {
      sorting = false;
    }
  });

  return app;
}
