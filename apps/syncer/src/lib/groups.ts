import type { Chapter, Group } from "../types";

export function groupsInChapter(chapter: Chapter): string[] {
  return chapter.relationships.filter((r) => r.type === "scanlation_group").map((r) => r.id);
}

export type GroupLookup = (ids: string[]) => Promise<Group[]>;

/**
 * Group id to display name, kept for the life of the process. Misses are deduplicated and fetched
 * in a single lookup before being merged in.
 */
export class GroupNameCache {
  private readonly names = new Map<string, string>();

  constructor(private readonly lookup: GroupLookup) {}

  get size(): number {
    return this.names.size;
  }

  async resolve(chapters: Chapter[]): Promise<Map<string, string>> {
    const out = new Map<string, string>();
    const missing: string[] = [];

    for (const id of new Set(chapters.flatMap(groupsInChapter))) {
      const cached = this.names.get(id);
      if (cached !== undefined) {
        out.set(id, cached);
      } else {
        missing.push(id);
      }
    }

    if (missing.length === 0) return out;

    for (const group of await this.lookup(missing)) {
      this.names.set(group.id, group.name);
      out.set(group.id, group.name);
    }
    return out;
  }
}

export function groupNamesFor(chapter: Chapter, names: ReadonlyMap<string, string>): string[] {
  return groupsInChapter(chapter).flatMap((id) => {
    const name = names.get(id);
    return name === undefined ? [] : [name];
  });
}
