import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import type { Retriever, Snippet } from './agents/type.js';
import { logger } from './logger.js';

const EntrySchema = z.object({
  id: z.string(),
  title: z.string(),
  text: z.string(),
  tags: z.array(z.string())
});
export type KnowledgeEntry = z.infer<typeof EntrySchema>;

export const DEFAULT_KNOWLEDGE_PATH = path.join(process.cwd(), 'knowledge-base', 'voltage_stability.json');

export function loadKnowledgeBase(file: string = DEFAULT_KNOWLEDGE_PATH): KnowledgeEntry[] {
  if (!fs.existsSync(file)) {
    logger.warn({ file }, '[Knowledge] knowledge base not found, question answers will have no reference material');
    return [];
  }
  return z.array(EntrySchema).parse(JSON.parse(fs.readFileSync(file, 'utf8')));
}

/** Tag-overlap retrieval over a small curated knowledge base. */
export class KeywordRetriever implements Retriever {
  constructor(private readonly entries: readonly KnowledgeEntry[], private readonly limit = 3) {}

  async retrieve(query: string): Promise<Snippet[]> {
    const input = ` ${(query || '').toLowerCase().replace(/[^a-z0-9 ]+/g, ' ')} `;
    return this.entries
      .map(e => ({
        id: e.id,
        title: e.title,
        text: e.text,
        score: e.tags.filter(tag => input.includes(` ${tag.toLowerCase()} `)).length
      }))
      .filter(s => s.score > 0)
      .sort((a, b) => b.score - a.score)
      .slice(0, this.limit);
  }
}
