import fs from "node:fs/promises";
import path from "node:path";
import sharp from "sharp";
import { z } from "zod";
import { ClassifierError, errorMessage } from "./errors.js";

export interface Classifier {
  /** Returns the model's trimmed one-line reply for a single image. */
  classify(imagePath: string, folders: readonly string[]): Promise<string>;
}

export type OpenRouterOptions = {
  apiKey: string;
  model: string;
  apiUrl: string;
  timeoutMs: number;
  fetch?: typeof fetch;
};

export type PreparedImage = {
  data: Buffer;
  mimeType: string;
};

const MAX_WIDTH = 2048;

// Offered when the output root has no folders yet
export const SEED_FOLDERS = ["cats", "dogs"];

const MIME_TYPES: Record<string, string> = {
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".gif": "image/gif",
  ".bmp": "image/bmp",
  ".tiff": "image/tiff",
  ".webp": "image/webp",
};

const ChatResponseSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable() }) }))
    .min(1),
});

const ErrorBodySchema = z.object({
  error: z.object({ message: z.string() }),
});

export function mimeTypeFor(fileName: string): string {
  return MIME_TYPES[path.extname(fileName).toLowerCase()] ?? "image/jpeg";
}

export function buildPrompt(folders: readonly string[]): string {
  const folderList = (folders.length ? folders : SEED_FOLDERS).join("\n");
  return `You sort images into folders. Reply with a single line and nothing else.
To put the image into one of the available folders, reply in this form:
image:folder
If none of the folders fits, you may create a new one by replying:
create_folder:NAME
The available folders are below
${folderList}

Please classify this image and respond with the appropriate folder or create_folder command.`;
}

// ── Downscale very large images; anything sharp can't read goes up raw ──

export async function prepareImage(filePath: string): Promise<PreparedImage> {
  const raw = await fs.readFile(filePath);
  const mimeType = mimeTypeFor(filePath);
  const name = path.basename(filePath);

  try {
    const meta = await sharp(raw).metadata();
    const width = meta.width ?? 0;
    if (width <= MAX_WIDTH) return { data: raw, mimeType };

    const data = await sharp(raw)
      .resize({ width: MAX_WIDTH, withoutEnlargement: true })
      .png()
      .toBuffer();
    console.log(`  Image prep: ${name} (${width}px → ${MAX_WIDTH}px)`);
    return { data, mimeType: "image/png" };
  } catch (err) {
    console.error(`  Image prep failed for ${name}, using raw:`, errorMessage(err));
    return { data: raw, mimeType };
  }
}

export class OpenRouterClassifier implements Classifier {
  private readonly options: OpenRouterOptions;
  private readonly fetchImpl: typeof fetch;

  constructor(options: OpenRouterOptions) {
    this.options = options;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async classify(imagePath: string, folders: readonly string[]): Promise<string> {
    const image = await prepareImage(imagePath);
    const { model, apiUrl, apiKey, timeoutMs } = this.options;

    console.log(`  Sending to ${model}...`);
    const start = Date.now();

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    // The deadline covers the body as well as the headers
    let response: Response;
    let text: string;
    try {
      response = await this.fetchImpl(apiUrl, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({
          model,
          messages: [
            {
              role: "user",
              content: [
                { type: "text", text: buildPrompt(folders) },
                {
                  type: "image_url",
                  image_url: {
                    url: `data:${image.mimeType};base64,${image.data.toString("base64")}`,
                  },
                },
              ],
            },
          ],
        }),
        signal: controller.signal,
      });
      text = await response.text();
    } catch (err) {
      if (controller.signal.aborted) {
        throw new ClassifierError(`Request timed out after ${timeoutMs}ms`, null, { cause: err });
      }
      throw new ClassifierError(`Request failed: ${errorMessage(err)}`, null, { cause: err });
    } finally {
      clearTimeout(timer);
    }

    if (!response.ok) {
      throw new ClassifierError(`API error ${response.status}: ${text}`, response.status);
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (err) {
      throw new ClassifierError("API returned a body that is not JSON", response.status, {
        cause: err,
      });
    }

    const parsed = ChatResponseSchema.safeParse(json);
    if (!parsed.success) {
      const apiError = ErrorBodySchema.safeParse(json);
      throw new ClassifierError(
        apiError.success
          ? `API error: ${apiError.data.error.message}`
          : "API response has no choices[0].message.content",
        response.status,
      );
    }

    const content = parsed.data.choices[0].message.content;
    if (content === null) {
      throw new ClassifierError("API response has an empty message", response.status);
    }

    const elapsed = ((Date.now() - start) / 1000).toFixed(1);
    console.log(`  Model responded in ${elapsed}s`);
    return content.trim();
  }
}
