import { z } from "zod";
import { mkdir, readFile, writeFile } from "fs/promises";
import { dirname } from "path";
import { manifestInvalid } from "./errors/catalog.js";
import { errorMessage } from "./errors/types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** One remote object and where it lands on disk */
export interface WorkItem {
  readonly sourceLocator: string;
  readonly destinationPath: string;
  /** Size reported by the listing, if any; informational only */
  readonly sizeHint?: number;
}

const PairSchema = z.tuple([z.string().min(1), z.string().min(1)]);

const ObjectSchema = z.object({
  sourceLocator: z.string().min(1),
  destinationPath: z.string().min(1),
  sizeHint: z.number().int().nonnegative().optional(),
});

const ManifestSchema = z.array(z.union([PairSchema, ObjectSchema]));

// ---------------------------------------------------------------------------
// Identity
// ---------------------------------------------------------------------------

/** Identity of an item: the (source, destination) pair */
export function workItemKey(item: WorkItem): string {
  return JSON.stringify([item.sourceLocator, item.destinationPath]);
}

/**
 * Drop repeated items, keeping the first occurrence and the original order.
 */
export function dedupeWorkItems(items: readonly WorkItem[]): {
  items: WorkItem[];
  removed: number;
} {
  const seen = new Set<string>();
  const unique: WorkItem[] = [];

  for (const item of items) {
    const key = workItemKey(item);
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(item);
  }

  return { items: unique, removed: items.length - unique.length };
}

// ---------------------------------------------------------------------------
// Persistence
// ---------------------------------------------------------------------------

/**
 * Read a cached manifest. Returns undefined when the file does not exist.
 */
export async function loadManifest(path: string): Promise<WorkItem[] | undefined> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (error) {
    if (isNotFound(error)) return undefined;
    throw manifestInvalid(path, errorMessage(error));
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw manifestInvalid(path, `invalid JSON: ${errorMessage(error)}`);
  }

  const result = ManifestSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw manifestInvalid(path, `${issue.path.join(".")}: ${issue.message}`);
  }

  return result.data.map((entry): WorkItem =>
    Array.isArray(entry)
      ? { sourceLocator: entry[0], destinationPath: entry[1] }
      : entry
  );
}

/**
 * Write the manifest as `[sourceLocator, destinationPath]` pairs.
 */
export async function saveManifest(path: string, items: readonly WorkItem[]): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const pairs = items.map((item) => [item.sourceLocator, item.destinationPath]);
  await writeFile(path, JSON.stringify(pairs, null, 2) + "\n", "utf-8");
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
