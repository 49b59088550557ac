import fs from "node:fs/promises";
import path from "node:path";
import { MoveError, errorMessage } from "./errors.js";

async function exists(p: string) {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}

/** Creates `outputDir/name`; resolves to false when it already existed. */
export async function createCategoryFolder(outputDir: string, name: string): Promise<boolean> {
  const folderPath = path.join(outputDir, name);
  const created = await fs.mkdir(folderPath, { recursive: true });
  if (created === undefined) return false;
  console.log(`  Created new folder: ${folderPath}`);
  return true;
}

// "photo.jpg" → "photo (2).jpg", "photo (3).jpg", ...
export async function freeTargetPath(targetDir: string, fileName: string) {
  const ext = path.extname(fileName);
  const base = fileName.slice(0, fileName.length - ext.length);

  let targetPath = path.join(targetDir, fileName);
  let counter = 2;
  while (await exists(targetPath)) {
    targetPath = path.join(targetDir, `${base} (${counter})${ext}`);
    counter++;
  }
  return targetPath;
}

async function moveFile(source: string, target: string) {
  try {
    await fs.rename(source, target);
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "EXDEV") {
      // Output root on another device
      await fs.copyFile(source, target, fs.constants.COPYFILE_EXCL);
      await fs.unlink(source);
      return;
    }
    throw err;
  }
}

/**
 * Moves `intakeDir/imageName` into `outputDir/folder`, creating the folder
 * if needed. Existing files are never overwritten. Returns the final path.
 */
export async function moveImage(
  intakeDir: string,
  outputDir: string,
  imageName: string,
  folder: string,
): Promise<string> {
  const sourcePath = path.join(intakeDir, imageName);
  if (!(await exists(sourcePath))) {
    throw new MoveError(`Source file ${sourcePath} does not exist`);
  }

  const targetDir = path.join(outputDir, folder);
  try {
    await fs.mkdir(targetDir, { recursive: true });
    const targetPath = await freeTargetPath(targetDir, imageName);
    await moveFile(sourcePath, targetPath);
    console.log(`  Moved: ${imageName} → ${path.relative(outputDir, targetPath)}`);
    return targetPath;
  } catch (err) {
    throw new MoveError(`Could not move ${imageName} to ${folder}: ${errorMessage(err)}`, {
      cause: err,
    });
  }
}
