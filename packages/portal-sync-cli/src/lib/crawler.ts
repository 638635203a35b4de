import * as cheerio from "cheerio";
import { join } from "path";
import type { Logger } from "./logger.js";
import type { AuthenticatedTransport } from "./transport.js";
import type { WorkItem } from "./manifest.js";
import { errorMessage } from "./errors/types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DirectoryListing {
  /** Absolute URLs */
  files: string[];
  /** Absolute URLs, each ending in "/" */
  directories: string[];
}

export interface DirectoryLister {
  list(directoryUrl: string, signal?: AbortSignal): Promise<DirectoryListing>;
}

export interface CrawlOptions {
  rootUrl: string;
  destinationDir: string;
  /** File name suffixes to keep; empty keeps everything */
  include: readonly string[];
  /** Directory names never descended into */
  excludeDirectories: readonly string[];
  logger: Logger;
  signal?: AbortSignal;
  onDirectory?: (url: string) => void;
}

// ---------------------------------------------------------------------------
// HTML listings
// ---------------------------------------------------------------------------

function isNavigationLink(href: string): boolean {
  return href.startsWith("../") || href.startsWith("./") || href.startsWith("?") || href.startsWith("/");
}

/**
 * Parse an autoindex-style HTML page into files and subdirectories.
 */
export function parseDirectoryListing(html: string, directoryUrl: string): DirectoryListing {
  const $ = cheerio.load(html);
  const listing: DirectoryListing = { files: [], directories: [] };
  const seen = new Set<string>();

  $("a[href]").each((_, element) => {
    const href = $(element).attr("href");
    if (!href || href.startsWith("#") || isNavigationLink(href)) return;

    const url = new URL(href, directoryUrl);
    url.hash = "";
    const absolute = url.toString();
    if (seen.has(absolute)) return;
    seen.add(absolute);

    if (href.endsWith("/")) {
      listing.directories.push(absolute);
    } else {
      listing.files.push(absolute);
    }
  });

  return listing;
}

export function createHtmlDirectoryLister(
  transport: Pick<AuthenticatedTransport, "request">
): DirectoryLister {
  return {
    async list(directoryUrl, signal) {
      const response = await transport.request("GET", directoryUrl, { signal });
      return parseDirectoryListing(await response.text(), response.url);
    },
  };
}

// ---------------------------------------------------------------------------
// Walk
// ---------------------------------------------------------------------------

function decodeSegment(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

/** A decoded segment that would leave its directory when joined */
function isUnsafeSegment(segment: string): boolean {
  return segment === ".." || segment === "." || segment.includes("/") || segment.includes("\\");
}

function lastSegment(pathname: string): string {
  const trimmed = pathname.replace(/\/+$/, "");
  return decodeSegment(trimmed.slice(trimmed.lastIndexOf("/") + 1));
}

/**
 * Walk the listing tree under `rootUrl` depth-first and build the manifest.
 * A directory whose listing fails is logged and contributes nothing.
 */
export async function crawlManifest(
  lister: DirectoryLister,
  options: CrawlOptions
): Promise<WorkItem[]> {
  const { destinationDir, include, excludeDirectories, signal, onDirectory } = options;
  const logger = options.logger.child({ component: "crawler" });

  const root = new URL(options.rootUrl);
  if (!root.pathname.endsWith("/")) root.pathname += "/";
  const rootUrl = root.toString();

  const excluded = new Set(excludeDirectories);
  const visited = new Set<string>();
  const items: WorkItem[] = [];

  function destinationFor(fileUrl: string): string | undefined {
    const relative = new URL(fileUrl).pathname.slice(root.pathname.length);
    const segments = relative.split("/").map(decodeSegment);
    if (segments.some(isUnsafeSegment)) return undefined;
    return join(destinationDir, ...segments);
  }

  function wanted(fileUrl: string): boolean {
    if (include.length === 0) return true;
    const name = lastSegment(new URL(fileUrl).pathname);
    return include.some((suffix) => name.endsWith(suffix));
  }

  async function walk(directoryUrl: string): Promise<void> {
    if (signal?.aborted || visited.has(directoryUrl)) return;
    visited.add(directoryUrl);
    onDirectory?.(directoryUrl);

    let listing: DirectoryListing;
    try {
      listing = await lister.list(directoryUrl, signal);
    } catch (error) {
      logger.warn("Could not list directory", { url: directoryUrl, error: errorMessage(error) });
      return;
    }

    for (const fileUrl of listing.files) {
      if (!fileUrl.startsWith(rootUrl) || !wanted(fileUrl)) continue;
      const destinationPath = destinationFor(fileUrl);
      if (destinationPath === undefined) {
        logger.warn("Skipping file whose name escapes the destination", { url: fileUrl });
        continue;
      }
      items.push({ sourceLocator: fileUrl, destinationPath });
    }

    for (const subdirectory of listing.directories) {
      if (!subdirectory.startsWith(rootUrl)) continue;
      if (excluded.has(lastSegment(new URL(subdirectory).pathname))) {
        logger.debug("Skipping excluded directory", { url: subdirectory });
        continue;
      }
      await walk(subdirectory);
    }
  }

  await walk(rootUrl);
  logger.info("Crawl finished", { directories: visited.size, files: items.length });
  return items;
}
