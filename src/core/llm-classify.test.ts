import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import sharp from "sharp";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ClassifierError } from "./errors.js";
import { OpenRouterClassifier, buildPrompt, mimeTypeFor, prepareImage } from "./llm-classify.js";

const API_URL = "https://example.test/v1/chat/completions";
const RAW = "not really an image";

let root: string;
let imagePath: string;

beforeEach(async () => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
  root = await fs.mkdtemp(path.join(os.tmpdir(), "image-sorter-llm-"));
  imagePath = path.join(root, "cat.png");
  await fs.writeFile(imagePath, RAW);
});

afterEach(async () => {
  vi.restoreAllMocks();
  await fs.rm(root, { recursive: true, force: true });
});

function reply(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function classifierWith(
  impl: (input: string | URL | Request, init?: RequestInit) => Promise<Response>,
  timeoutMs = 5000,
) {
  const fetchMock = vi.fn(impl);
  const classifier = new OpenRouterClassifier({
    apiKey: "test-secret",
    model: "test/vision-model",
    apiUrl: API_URL,
    timeoutMs,
    fetch: fetchMock,
  });
  return { classifier, fetchMock };
}

async function solidPng(width: number, height: number) {
  return sharp({
    create: { width, height, channels: 3, background: { r: 200, g: 40, b: 40 } },
  })
    .png()
    .toBuffer();
}

describe("buildPrompt", () => {
  it("lists the known folders one per line", () => {
    expect(buildPrompt(["birds", "fish"])).toContain(
      "The available folders are below\nbirds\nfish\n",
    );
  });

  it("offers seed folders when none exist", () => {
    expect(buildPrompt([])).toContain("The available folders are below\ncats\ndogs\n");
  });
});

describe("mimeTypeFor", () => {
  it("follows the extension", () => {
    expect(mimeTypeFor("a.JPG")).toBe("image/jpeg");
    expect(mimeTypeFor("a.webp")).toBe("image/webp");
    expect(mimeTypeFor("a.tiff")).toBe("image/tiff");
  });
});

describe("prepareImage", () => {
  it("passes small images through untouched", async () => {
    const png = await solidPng(10, 10);
    await fs.writeFile(imagePath, png);

    const prepared = await prepareImage(imagePath);

    expect(prepared.mimeType).toBe("image/png");
    expect(prepared.data.equals(png)).toBe(true);
  });

  it("downscales wide images to 2048px", async () => {
    const wide = path.join(root, "wide.jpg");
    await fs.writeFile(wide, await solidPng(3000, 10));

    const prepared = await prepareImage(wide);
    const meta = await sharp(prepared.data).metadata();

    expect(prepared.mimeType).toBe("image/png");
    expect(meta.width).toBe(2048);
  });

  it("falls back to the raw bytes when the image can't be read", async () => {
    const prepared = await prepareImage(imagePath);

    expect(prepared.data.toString()).toBe(RAW);
    expect(prepared.mimeType).toBe("image/png");
  });
});

describe("OpenRouterClassifier", () => {
  it("posts the prompt and image and returns the trimmed reply", async () => {
    const { classifier, fetchMock } = classifierWith(async () =>
      reply({ choices: [{ message: { content: "  cat.png:cats \n" } }] }),
    );

    await expect(classifier.classify(imagePath, ["cats"])).resolves.toBe("cat.png:cats");

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe(API_URL);
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({
      Authorization: "Bearer test-secret",
      "Content-Type": "application/json",
    });

    const body = JSON.parse(String(init?.body));
    expect(body.model).toBe("test/vision-model");
    expect(body.messages).toEqual([
      {
        role: "user",
        content: [
          { type: "text", text: buildPrompt(["cats"]) },
          {
            type: "image_url",
            image_url: {
              url: `data:image/png;base64,${Buffer.from(RAW).toString("base64")}`,
            },
          },
        ],
      },
    ]);
  });

  it("reports HTTP errors with the body", async () => {
    const { classifier } = classifierWith(async () => new Response("boom", { status: 500 }));

    const err = await classifier.classify(imagePath, []).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ClassifierError);
    expect(err instanceof ClassifierError && err.message).toBe("API error 500: boom");
    expect(err instanceof ClassifierError && err.status).toBe(500);
  });

  it("reports error bodies sent with a 200", async () => {
    const { classifier } = classifierWith(async () =>
      reply({ error: { message: "Rate limit exceeded" } }),
    );

    await expect(classifier.classify(imagePath, [])).rejects.toThrow(
      "API error: Rate limit exceeded",
    );
  });

  it("rejects responses without a message", async () => {
    const { classifier } = classifierWith(async () => reply({ choices: [] }));

    await expect(classifier.classify(imagePath, [])).rejects.toThrow(
      "API response has no choices[0].message.content",
    );
  });

  it("wraps network failures", async () => {
    const { classifier } = classifierWith(async () => {
      throw new TypeError("fetch failed");
    });

    await expect(classifier.classify(imagePath, [])).rejects.toThrow(
      "Request failed: fetch failed",
    );
  });

  it("gives up after the timeout", async () => {
    const { classifier } = classifierWith(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
        }),
      20,
    );

    await expect(classifier.classify(imagePath, [])).rejects.toThrow(
      "Request timed out after 20ms",
    );
  });

  it("times out when the body stalls after the headers", async () => {
    const { classifier } = classifierWith(async (_input, init) => {
      const body = new ReadableStream<Uint8Array>({
        start(stream) {
          stream.enqueue(new TextEncoder().encode('{"choices":'));
          init?.signal?.addEventListener("abort", () => stream.error(new Error("aborted")));
        },
      });
      return new Response(body, { status: 200 });
    }, 50);

    await expect(classifier.classify(imagePath, [])).rejects.toThrow(
      "Request timed out after 50ms",
    );
  });
});
