import type { AggregateStats, NamespaceStats } from '../cache';
import type { QueryOutcome } from '../conjugator';
import type { TenseDefinition } from '../grammar';

export class JsonReporter {
  /**
   * Full outcome, including failures, as pretty-printed JSON
   */
  renderOutcome(outcome: QueryOutcome): string {
    return JSON.stringify(outcome, null, 2);
  }

  renderStats(stats: AggregateStats | NamespaceStats): string {
    return JSON.stringify(stats, null, 2);
  }

  renderAliases(tenses: readonly TenseDefinition[]): string {
    const aliases = tenses.map((tense) => ({
      tense: tense.key,
      mood: tense.mood,
      aliases: [...tense.aliases],
    }));
    return JSON.stringify(aliases, null, 2);
  }
}
