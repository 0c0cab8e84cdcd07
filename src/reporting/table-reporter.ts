import chalk from 'chalk';
import Table from 'cli-table3';
import type { AggregateStats, NamespaceStats } from '../cache';
import type { QueryOutcome, VerbInfo } from '../conjugator';
import type { PersonForm, PersonKey, TableRow, TenseDefinition } from '../grammar';
import { formatSize } from './format';

type Outcome<S extends QueryOutcome['status']> = Extract<QueryOutcome, { status: S }>;

const NO_PERSON = '—';

const VALID_PERSONS = 'je, tu, il/elle/on, nous, vous, ils/elles';

const PERSON_LABELS: Record<PersonKey, string> = {
  je: 'je',
  tu: 'tu',
  il: 'il/elle/on',
  nous: 'nous',
  vous: 'vous',
  ils: 'ils/elles',
};

function createTable(head: string[]) {
  // Plain style: colours come from chalk so they follow chalk.level
  return new Table({
    head: head.map((label) => chalk.bold(label)),
    style: { head: [], border: [] },
  });
}

/**
 * Terminal rendering of query outcomes and cache statistics.
 */
export class TableReporter {
  /**
   * Text for an answered query, or `undefined` when the outcome carries no answer
   * (see `describeFailure`).
   */
  renderOutcome(outcome: QueryOutcome): string | undefined {
    switch (outcome.status) {
      case 'table':
        return this.renderTable(outcome);
      case 'person-forms':
        return this.renderPersonForms(outcome);
      case 'form':
        return this.renderForm(outcome);
      default:
        return undefined;
    }
  }

  renderTable(outcome: Outcome<'table'>): string {
    const sections: string[] = [chalk.bold.blue(`Conjugaisons de '${outcome.verb}'`)];

    let currentMood: string | undefined;
    for (const row of outcome.rows) {
      if (row.mood !== currentMood) {
        currentMood = row.mood;
        sections.push('', chalk.bold.magenta(`═══ ${row.mood.toUpperCase()} ═══`));
      }
      sections.push(chalk.bold.cyan(row.tense), this.renderRow(row));
    }

    if (outcome.info) {
      sections.push('', chalk.dim(describeVerb(outcome.info, outcome.verb)));
    }

    return sections.join('\n');
  }

  renderPersonForms(outcome: Outcome<'person-forms'>): string {
    const table = createTable(['Temps', 'Conjugaison']);
    for (const entry of outcome.forms) {
      table.push([chalk.magenta(tenseLabel(entry)), chalk.green(entry.form)]);
    }
    return [
      chalk.bold.blue(`Conjugaisons de '${outcome.verb}' pour '${outcome.person}'`),
      table.toString(),
    ].join('\n');
  }

  renderForm(outcome: Outcome<'form'>): string {
    const title = outcome.person
      ? `${chalk.cyan(outcome.person)} + ${chalk.magenta(outcome.tense)}`
      : `${chalk.magenta(outcome.verb)} - ${chalk.magenta(outcome.tense)}`;
    return `${title}: ${chalk.bold.green(outcome.form)}`;
  }

  renderStats(stats: AggregateStats): string {
    const populated = stats.namespaces.filter((row) => row.totalEntries > 0);
    if (populated.length === 0) {
      return chalk.dim('No cached data found');
    }

    const table = createTable(['Cache', 'Entries', 'Size', 'Expired']);
    for (const row of populated) {
      table.push(statsCells(row));
    }

    const { totalEntries, storageSize, expiredEntries } = stats.totals;
    const lines = [
      table.toString(),
      `${chalk.bold('Total:')} ${totalEntries} entries, ${formatSize(storageSize)}`,
    ];
    if (expiredEntries > 0) {
      lines.push(chalk.dim("Use 'cj cache cleanup' to remove expired entries"));
    }
    return lines.join('\n');
  }

  renderNamespaceStats(stats: NamespaceStats): string {
    const table = createTable(['Cache', 'Entries', 'Size', 'Expired']);
    table.push(statsCells(stats));
    return table.toString();
  }

  renderAliases(tenses: readonly TenseDefinition[]): string {
    const table = createTable(['Tense', 'Aliases']);
    for (const tense of tenses) {
      // The first alias is the full name, already shown in the first column
      const shortcuts = tense.aliases.slice(1);
      if (shortcuts.length > 0) {
        table.push([
          chalk.magenta(tense.key),
          shortcuts.map((alias) => chalk.cyan(alias)).join(', '),
        ]);
      }
    }
    return table.toString();
  }

  private renderRow(row: TableRow): string {
    const table = createTable(['Personne', 'Conjugaison']);
    for (const cell of row.cells) {
      const person = cell.person ? PERSON_LABELS[cell.person] : NO_PERSON;
      table.push([chalk.cyan(person), chalk.green(cell.form)]);
    }
    return table.toString();
  }
}

/**
 * User-facing explanation of an outcome that carries no answer.
 */
export function describeFailure(outcome: QueryOutcome): string | undefined {
  switch (outcome.status) {
    case 'unknown-person':
      return `Unknown person: '${outcome.input}' (valid persons: ${VALID_PERSONS})`;
    case 'unknown-tense':
      return `Unknown tense: '${outcome.input}' (see 'cj aliases')`;
    case 'person-required':
      return `Tense '${outcome.tense}' requires a person. Use: cj form <person> <verb> <tense>`;
    case 'provider-failure':
      return `No conjugations found for '${outcome.verb}': ${outcome.message}`;
    case 'not-found':
      return describeNotFound(outcome);
    default:
      return undefined;
  }
}

function describeNotFound(outcome: Outcome<'not-found'>): string {
  const target = [outcome.person, outcome.tense].filter(Boolean).join(' in ');
  switch (outcome.reason) {
    case 'no-forms':
      return outcome.person
        ? `No conjugations found for person '${outcome.person}'`
        : `No conjugations found for '${outcome.verb}'`;
    case 'person-not-applicable':
      return `'${outcome.tense}' has no form for '${outcome.person}'`;
    case 'malformed-row':
      return `The conjugation data for '${outcome.verb}' is damaged for ${target}`;
    default:
      return `No conjugation found for '${outcome.verb}' (${target})`;
  }
}

function statsCells(row: NamespaceStats): string[] {
  return [
    chalk.cyan(row.namespace),
    chalk.green(String(row.totalEntries)),
    chalk.yellow(formatSize(row.storageSize)),
    chalk.red(String(row.expiredEntries)),
  ];
}

function tenseLabel(entry: PersonForm): string {
  return `${entry.mood} ${entry.tense}`;
}

function describeVerb(info: VerbInfo, verb: string): string {
  const infinitive = info.infinitive || verb;
  return info.translation_en
    ? `Infinitif: ${infinitive} | EN: ${info.translation_en}`
    : `Infinitif: ${infinitive}`;
}
