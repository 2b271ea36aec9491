export type LocalizedString = Record<string, string>;

export type Relationship = {
  id: string;
  type: string;
};

export type ChapterAttributes = {
  volume?: string;
  chapter?: string;
  title?: string;
  externalUrl?: string;
};

export type Chapter = {
  id: string;
  attributes: ChapterAttributes;
  relationships: Relationship[];
};

export type Manga = {
  id: string;
  attributes: {
    title: LocalizedString;
  };
};

export type ChapterFeedPage = {
  data: Chapter[];
  total: number;
};

export type AtHomeServer = {
  baseUrl: string;
  chapter: {
    hash: string;
    data: string[];
  };
};

export type Group = {
  id: string;
  name: string;
};

export type SyncSummary = {
  downloaded: number;
  skipped: number;
  renamed: number;
  failures: Array<{ chapterId: string; message: string }>;
};
