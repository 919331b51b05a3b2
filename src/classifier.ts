import type { TrackCatalog } from "./catalog";
import { UnknownContentTypeError } from "./errors";
import type { LibraryConfig } from "./library";
import type { MoodCategory, MusicSuggestion } from "./types";

function normalizeLabel(label: string): string {
  return label.trim().toLowerCase().replace(/[\s-]+/g, "_");
}

export class MoodClassifier {
  private readonly contentTypes: ReadonlyMap<string, MoodCategory>;
  private readonly contexts: ReadonlyMap<string, MoodCategory>;

  constructor(private readonly library: LibraryConfig) {
    this.contentTypes = new Map(
      Object.entries(library.contentTypes).map(([k, v]) => [normalizeLabel(k), v])
    );
    this.contexts = new Map(
      Object.entries(library.emotionalContexts).map(([k, v]) => [normalizeLabel(k), v])
    );
  }

  /**
   * Maps a content type to a mood. The content type must resolve (directly or through the
   * configured default) before an emotional-context hint may override it.
   */
  classify(contentType: string, emotionalContext?: string): MoodCategory {
    const base = this.contentTypes.get(normalizeLabel(contentType)) ?? this.library.defaultMood;
    if (!base) {
      throw new UnknownContentTypeError(contentType);
    }
    if (emotionalContext) {
      return this.contexts.get(normalizeLabel(emotionalContext)) ?? base;
    }
    return base;
  }

  knownContentTypes(): string[] {
    return [...this.contentTypes.keys()];
  }

  suggest(contentType: string, catalog: TrackCatalog): MusicSuggestion {
    const mood = this.classify(contentType);
    const profile = this.library.profiles[mood];
    return {
      contentType,
      mood,
      profile,
      availableTracks: catalog.byMood(mood).length,
      searchTerms: profile.searchTerms.length ? profile.searchTerms : ["instrumental", "background"]
    };
  }
}
