import fs from "node:fs/promises";
import path from "node:path";

export const IMAGE_EXTENSIONS = [
  ".png",
  ".jpg",
  ".jpeg",
  ".gif",
  ".bmp",
  ".tiff",
  ".webp",
] as const;

export function isImageFile(name: string): boolean {
  const ext = path.extname(name).toLowerCase();
  return (IMAGE_EXTENSIONS as readonly string[]).includes(ext);
}

export async function ensureFolders(intakeDir: string, outputDir: string) {
  await fs.mkdir(intakeDir, { recursive: true });
  await fs.mkdir(outputDir, { recursive: true });
  console.log(`Created/verified folders: ${intakeDir}, ${outputDir}`);
}

// Regular files only; anything not on the allow-list never reaches the classifier
export async function listImageFiles(intakeDir: string): Promise<string[]> {
  const entries = await fs.readdir(intakeDir, { withFileTypes: true });
  return entries
    .filter((e) => e.isFile() && isImageFile(e.name))
    .map((e) => e.name)
    .sort();
}

export async function listCategoryFolders(outputDir: string): Promise<string[]> {
  const entries = await fs.readdir(outputDir, { withFileTypes: true });
  return entries
    .filter((e) => e.isDirectory())
    .map((e) => e.name)
    .sort();
}
