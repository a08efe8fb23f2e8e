/**
 * Offline people JSON linter.
 *
 *   tsx scripts/lint-people.ts <input> --out cleaned.json [--csv people.csv] [--preclean]
 *
 * Prints the report as JSON. On pass writes the cleaned document (and the
 * CSV pivot when asked) and exits 0; on fail writes nothing and exits 1.
 */

import * as fs from 'fs';
import { parseArgs } from 'util';
import { type LintReport, lintPeopleText } from '../services/people/lint';

export interface LintCliOptions {
  input: string;
  out: string;
  csv?: string;
  preclean: boolean;
}

export interface LintCliResult {
  exitCode: 0 | 1;
  report: LintReport;
}

export function parseLintArgs(argv: string[]): LintCliOptions {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      out: { type: 'string' },
      csv: { type: 'string' },
      preclean: { type: 'boolean', default: false },
    },
  });
  const input = positionals[0];
  if (!input || !values.out) {
    throw new Error('usage: lint-people <input> --out <file> [--csv <file>] [--preclean]');
  }
  return {
    input,
    out: values.out,
    ...(values.csv ? { csv: values.csv } : {}),
    preclean: values.preclean ?? false,
  };
}

export async function runLintPeople(options: LintCliOptions): Promise<LintCliResult> {
  let raw: string;
  try {
    raw = await fs.promises.readFile(options.input, 'utf8');
  } catch (err) {
    const missing = err instanceof Error && 'code' in err && err.code === 'ENOENT';
    const reason = missing ? 'File not found' : 'Cannot read file';
    return {
      exitCode: 1,
      report: { status: 'fail', errors: [`${reason}: ${options.input}`], warnings: [], people_count: 0 },
    };
  }

  const { report, cleaned, csv } = lintPeopleText(raw, { preclean: options.preclean });
  if (report.status === 'fail' || !cleaned) return { exitCode: 1, report };

  await fs.promises.writeFile(options.out, `${JSON.stringify(cleaned, null, 2)}\n`, 'utf8');
  if (options.csv && csv !== null) await fs.promises.writeFile(options.csv, csv, 'utf8');
  return { exitCode: 0, report };
}

/* c8 ignore start */
if (process.argv[1]?.endsWith('lint-people.ts')) {
  Promise.resolve()
    .then(() => runLintPeople(parseLintArgs(process.argv.slice(2))))
    .then(({ exitCode, report }) => {
      // eslint-disable-next-line no-console
      console.log(JSON.stringify(report, null, 2));
      process.exit(exitCode);
    })
    .catch((err) => {
      // eslint-disable-next-line no-console
      console.error(err instanceof Error ? err.message : err);
      process.exit(2);
    });
}
/* c8 ignore stop */
