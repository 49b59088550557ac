import { firstLine, unquote } from "./utils.js";

export type ClassificationReply =
  | { kind: "create_folder"; folder: string }
  | { kind: "place"; folder: string }
  | { kind: "invalid"; reason: string };

const CREATE_PREFIX = "create_folder:";

/**
 * Returns why `name` can't be used as a category folder, or null when it can.
 * Folder names are a single path segment under the output root.
 */
export function folderNameProblem(name: string): string | null {
  if (!name) return "folder name is empty";
  if (name === "." || name === "..") return `"${name}" is not a folder name`;
  if (/[/\\\0]/.test(name)) return `folder name "${name}" contains a path separator`;
  return null;
}

function withFolder(
  kind: "create_folder" | "place",
  rawFolder: string,
): ClassificationReply {
  const folder = unquote(rawFolder);
  const problem = folderNameProblem(folder);
  return problem ? { kind: "invalid", reason: problem } : { kind, folder };
}

/**
 * Interprets the model's reply for `imageName`. Accepted forms:
 *
 *   create_folder:NAME
 *   <imageName>:folder
 *   anything:folder
 *   folder
 */
export function parseReply(imageName: string, reply: string): ClassificationReply {
  const line = unquote(firstLine(reply));
  if (!line) return { kind: "invalid", reason: "empty reply" };

  if (line.toLowerCase().startsWith(CREATE_PREFIX)) {
    return withFolder("create_folder", line.slice(CREATE_PREFIX.length));
  }

  const colon = line.indexOf(":");
  if (colon === -1) return withFolder("place", line);

  const label = unquote(line.slice(0, colon));
  if (label !== imageName) {
    console.log(`  Reply not in image:folder form for ${imageName}: ${line}`);
  }
  return withFolder("place", line.slice(colon + 1));
}
