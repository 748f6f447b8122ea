/**
 * View Projector
 *
 * Derives the named output views from a validated dataset. Views share the
 * dataset's frozen records rather than copying them.
 */
import type { Dataset, Entry } from '../models/dataset.js';
import type { SimplifiedEntry, ViewByName, ViewName } from '../models/views.js';

export type Summarizer = (description: string) => string;

export interface ProjectionOptions {
  summarize?: Summarizer;
}

export const DEFAULT_SENTENCE_TERMINATORS = '.!?';

/**
 * Summary rule: text up to and including the first terminator character,
 * or the whole description when it has none.
 */
export function createSentenceSummarizer(terminators: string = DEFAULT_SENTENCE_TERMINATORS): Summarizer {
  const stops = new Set(terminators);
  return (description) => {
    for (let i = 0; i < description.length; i++) {
      if (stops.has(description[i])) {
        return description.slice(0, i + 1);
      }
    }
    return description;
  };
}

export const firstSentence: Summarizer = createSentenceSummarizer();

function simplifyEntry(entry: Entry, summarize: Summarizer): SimplifiedEntry {
  return {
    id: entry.id,
    title: entry.title,
    summary: summarize(entry.description),
  };
}

export function projectView<V extends ViewName>(
  dataset: Dataset,
  view: V,
  options: ProjectionOptions = {},
): ViewByName[V] {
  const views: { [K in ViewName]: () => ViewByName[K] } = {
    full: () => ({
      metadata: dataset.metadata,
      entries: dataset.entries,
      mappings: dataset.mappings,
      incidents: dataset.incidents,
    }),
    entries: () => ({ entries: dataset.entries }),
    mappings: () => ({ mappings: dataset.mappings }),
    simplified: () => ({
      entries: dataset.entries.map((entry) => simplifyEntry(entry, options.summarize ?? firstSentence)),
    }),
  };
  return views[view]();
}
