import { z } from "zod";
import { DEFAULT_HUB_URL } from "../config/index.js";
import { logger } from "../config/logger.js";
import { RegistryError } from "../errors.js";

const tagSchema = z.object({
  name: z.string().min(1),
  last_updated: z.string().nullish(),
  full_size: z.number().nullish(),
});

const tagPageSchema = z.object({
  count: z.number().optional(),
  next: z.string().nullish(),
  results: z.array(tagSchema),
});

export interface TagInfo {
  name: string;
  lastUpdated: string | null;
  fullSize: number | null;
}

export interface TagPage {
  tags: TagInfo[];
  /** The page number to ask for next, or null on the last page. */
  next: number | null;
}

export interface ListTagsOptions {
  repository: string;
  page?: number;
  pageSize?: number;
}

export const DEFAULT_PAGE_SIZE = 25;

/**
 * Lists image tags from the Docker Hub v2 API, most recently updated first.
 */
export class HubClient {
  constructor(private readonly baseUrl: string = DEFAULT_HUB_URL) {}

  async listTags({ repository, page = 1, pageSize = DEFAULT_PAGE_SIZE }: ListTagsOptions): Promise<TagPage> {
    const url = `${this.baseUrl.replace(/\/+$/, "")}/repositories/${repository}/tags?page=${page}&page_size=${pageSize}&ordering=last_updated`;

    let res: Response;
    try {
      res = await fetch(url, { headers: { Accept: "application/json" } });
    } catch (err) {
      throw new RegistryError(`Failed to reach registry for ${repository}: ${err instanceof Error ? err.message : String(err)}`);
    }
    if (!res.ok) {
      throw new RegistryError(`Failed to list tags for ${repository}: ${res.status} ${res.statusText}`, res.status);
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (err) {
      throw new RegistryError(`Registry returned a non-JSON tag list for ${repository}: ${String(err)}`, res.status);
    }
    const parsed = tagPageSchema.safeParse(body);
    if (!parsed.success) {
      throw new RegistryError(`Registry returned an unexpected tag list for ${repository}`, res.status);
    }

    logger.debug(`Fetched ${parsed.data.results.length} tags for ${repository} (page ${page})`);
    return {
      tags: parsed.data.results.map((t) => ({
        name: t.name,
        lastUpdated: t.last_updated ?? null,
        fullSize: t.full_size ?? null,
      })),
      next: parsed.data.next ? page + 1 : null,
    };
  }
}

const DAY_MS = 24 * 60 * 60 * 1000;

/** "N days ago" style age, in whole days/weeks/months/years. Unparseable input gives "unknown time ago". */
export function relativeAge(value: string | null, now: Date = new Date()): string {
  if (!value) return "unknown time ago";
  const then = Date.parse(value);
  if (Number.isNaN(then)) return "unknown time ago";

  const days = Math.max(0, Math.floor((now.getTime() - then) / DAY_MS));
  const plural = (n: number, unit: string) => `${n} ${unit}${n === 1 ? "" : "s"} ago`;
  if (days >= 365) return plural(Math.floor(days / 365), "year");
  if (days >= 30) return plural(Math.floor(days / 30), "month");
  if (days >= 7) return plural(Math.floor(days / 7), "week");
  return plural(days, "day");
}
