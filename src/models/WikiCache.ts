/**
 * Wiki Cache Model
 *
 * Generated documentation for one repository and language, as stored in a
 * wiki cache file. Nested objects keep the generator's camelCase field names;
 * the top-level keys are snake_case on disk. Optional fields may be null in
 * files written by older generators.
 */

import { z } from 'zod';

/**
 * Composite address of one cached wiki
 *
 * repoType, owner and language never contain "_"; repo may.
 */
export interface WikiCacheKey {
  owner: string;
  repo: string;
  repoType: string;
  language: string;
}

export const WikiPageSchema = z.object({
  id: z.string(),
  title: z.string(),
  content: z.string(),
  filePaths: z.array(z.string()),
  /** high | medium | low, not enforced */
  importance: z.string(),
  relatedPages: z.array(z.string())
});

export const WikiSectionSchema = z.object({
  id: z.string(),
  title: z.string(),
  pages: z.array(z.string()),
  subsections: z.array(z.string()).nullish()
});

export const WikiStructureSchema = z.object({
  id: z.string(),
  title: z.string(),
  description: z.string(),
  pages: z.array(WikiPageSchema),
  sections: z.array(WikiSectionSchema).nullish(),
  rootSections: z.array(z.string()).nullish()
});

/**
 * Source repository. Access tokens are never persisted, so a token in an
 * older file is dropped when it is read.
 */
export const RepoDescriptorSchema = z.object({
  owner: z.string(),
  repo: z.string(),
  type: z.string(),
  localPath: z.string().nullish(),
  repoUrl: z.string().nullish()
});

export const WikiCacheFileSchema = z.object({
  wiki_structure: WikiStructureSchema,
  generated_pages: z.record(z.string(), WikiPageSchema),
  repo_url: z.string().nullish(),
  repo: RepoDescriptorSchema.nullish(),
  provider: z.string().nullish(),
  model: z.string().nullish()
});

export type WikiPage = z.infer<typeof WikiPageSchema>;
export type WikiSection = z.infer<typeof WikiSectionSchema>;
export type WikiStructure = z.infer<typeof WikiStructureSchema>;
export type RepoDescriptor = z.infer<typeof RepoDescriptorSchema>;
export type WikiCacheFile = z.infer<typeof WikiCacheFileSchema>;

export interface WikiCacheEntry {
  wikiStructure: WikiStructure;
  /** pageId → page */
  generatedPages: Record<string, WikiPage>;
  /** Set by older generators instead of repo */
  repoUrl?: string | null;
  repo?: RepoDescriptor | null;
  /** Generation provider and model that produced the pages */
  provider?: string | null;
  model?: string | null;
}

/**
 * Listing row for one cache file
 */
export interface CachedWikiSummary {
  /** Cache filename */
  id: string;
  key: WikiCacheKey;
  /** "owner/repo" */
  name: string;
  /** File modification time, epoch milliseconds */
  submittedAt: number;
}

export function toWikiCacheFile(entry: WikiCacheEntry): WikiCacheFile {
  const file: WikiCacheFile = {
    wiki_structure: entry.wikiStructure,
    generated_pages: entry.generatedPages
  };
  if (entry.repoUrl !== undefined) file.repo_url = entry.repoUrl;
  if (entry.repo !== undefined) file.repo = entry.repo && stripRepoSecrets(entry.repo);
  if (entry.provider !== undefined) file.provider = entry.provider;
  if (entry.model !== undefined) file.model = entry.model;
  return file;
}

export function fromWikiCacheFile(file: WikiCacheFile): WikiCacheEntry {
  const entry: WikiCacheEntry = {
    wikiStructure: file.wiki_structure,
    generatedPages: file.generated_pages
  };
  if (file.repo_url !== undefined) entry.repoUrl = file.repo_url;
  if (file.repo !== undefined) entry.repo = file.repo;
  if (file.provider !== undefined) entry.provider = file.provider;
  if (file.model !== undefined) entry.model = file.model;
  return entry;
}

/**
 * Copy of a repo descriptor with only the persisted fields
 */
function stripRepoSecrets(repo: RepoDescriptor): RepoDescriptor {
  return RepoDescriptorSchema.parse(repo);
}

/**
 * Ids in generatedPages that the wiki structure does not list
 *
 * Diagnostic only; the cache stores entries regardless.
 */
export function findOrphanPages(entry: WikiCacheEntry): string[] {
  const known = new Set(entry.wikiStructure.pages.map((page) => page.id));
  return Object.keys(entry.generatedPages).filter((id) => !known.has(id));
}
