/**
 * CLI Runner - Dispatch a parsed command against a corpus
 */

import * as path from 'path';
import { SkillCatalog, type CatalogOptions } from '../catalog.js';
import { parseArgs, USAGE, type CliOptions, type CommandName } from './args.js';
import { colors, formatError, formatSuccess, formatTable, reportStyle } from './ui.js';
import { formatReport } from '../consistency/report.js';
import { formatSkillActivation } from '../tools/skill-tools.js';
import {
  formatReadingGuide,
  suggestImprovements,
  type DocumentAnalysis,
} from '../analysis/reading-level.js';
import { formatList } from '../base/utils/format-utils.js';
import { isSkillbookError } from '../errors.js';

export interface CliIO {
  out(text: string): void;
  err(text: string): void;
}

export interface RunOptions {
  cwd?: string;
  io?: CliIO;
  /** Home directory for user-level settings */
  homeDir?: string;
  env?: NodeJS.ProcessEnv;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

const consoleIO: CliIO = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
};

interface CommandContext {
  catalog: SkillCatalog;
  args: string[];
  options: CliOptions;
  io: CliIO;
}

type CommandHandler = (context: CommandContext) => Promise<number>;

function printJson(io: CliIO, value: unknown): void {
  io.out(JSON.stringify(value, null, 2));
}

function analysisRows(documents: DocumentAnalysis[]): string[][] {
  return documents.map((document) => [
    document.name,
    String(document.readingTime.totalMinutes),
    document.complexity.gradeLevel.toFixed(1),
    `${document.complexity.fleschScore.toFixed(1)} (${document.readingLevel.fleschInterpretation})`,
    document.readingLevel.level,
  ]);
}

const ANALYSIS_HEADERS = ['Document', 'Minutes', 'Grade', 'Flesch', 'Level'];

function printSuggestions(io: CliIO, documents: DocumentAnalysis[]): void {
  for (const document of documents) {
    const suggestions = suggestImprovements(document);
    if (suggestions.length === 0) continue;
    io.out('');
    io.out(`Suggestions for ${document.name}:`);
    io.out(formatList(suggestions));
  }
}

const handlers: Record<CommandName, CommandHandler> = {
  async check({ catalog, options, io }) {
    const report = await catalog.checkConsistency();

    if (options.json) {
      printJson(io, report);
    } else if (report.issues.length === 0) {
      io.out(formatSuccess(formatReport(report)));
    } else {
      io.out(formatReport(report, reportStyle));
    }

    const failed = !report.ok || (options.strict && report.warnings > 0);
    return failed ? EXIT_FAILURE : EXIT_OK;
  },

  async list({ catalog, options, io }) {
    const entries = catalog.listSkills();

    if (options.json) {
      printJson(io, entries);
    } else {
      io.out(formatTable(['Skill', 'Description'], entries.map((entry) => [entry.name, entry.description])));
    }
    return EXIT_OK;
  },

  async find({ catalog, args, options, io }) {
    const intent = args.join(' ');
    const matches = await catalog.findSkillMatches(intent, { limit: options.limit });

    if (options.json) {
      printJson(io, matches);
    } else if (matches.length === 0) {
      io.out(colors.muted('No matching skills.'));
    } else {
      const rows = matches.map((match, i) => [
        String(i + 1),
        match.name,
        match.score.toFixed(2),
        catalog.registry.get(match.name)?.description ?? '',
      ]);
      io.out(formatTable(['#', 'Skill', 'Score', 'Description'], rows));
    }
    return EXIT_OK;
  },

  async show({ catalog, args, options, io }) {
    const manifest = await catalog.loadManifest(args[0]);

    if (options.json) {
      const { raw: _raw, ...rest } = manifest;
      printJson(io, rest);
    } else {
      io.out(formatSkillActivation(manifest));
    }
    return EXIT_OK;
  },

  async ref({ catalog, args, options, io }) {
    const document = await catalog.resolveReference(args[0], args[1]);

    if (options.json) {
      printJson(io, document);
    } else {
      io.out(document.content);
    }
    return EXIT_OK;
  },

  async stats({ catalog, args, options, io }) {
    if (args.length === 1) {
      const analysis = await catalog.analyzeSkill(args[0]);
      const documents = [analysis.manifest, ...analysis.references];
      if (options.json) {
        printJson(io, analysis);
      } else {
        io.out(formatTable(ANALYSIS_HEADERS, analysisRows(documents)));
        io.out('');
        io.out(formatReadingGuide(analysis.manifest));
        printSuggestions(io, documents);
      }
      return EXIT_OK;
    }

    const corpus = await catalog.analyzeCorpus();
    if (options.json) {
      printJson(io, corpus);
      return EXIT_OK;
    }

    const documents = corpus.skills.flatMap((skill) => [skill.manifest, ...skill.references]);
    const { summary } = corpus;
    io.out(formatTable(ANALYSIS_HEADERS, analysisRows(documents)));
    io.out('');
    io.out(`Total documents: ${summary.totalDocuments}`);
    io.out(`Average reading time: ${summary.averages.readingTime} minutes`);
    io.out(`Average grade level: ${summary.averages.gradeLevel}`);
    io.out(`Average technical density: ${summary.averages.technicalDensity}%`);
    return EXIT_OK;
  },

  async guide({ catalog, args, io }) {
    const [skill, referencePath] = args;
    const analysis =
      referencePath === undefined
        ? await catalog.analyzeManifest(skill)
        : await catalog.analyzeReference(skill, referencePath);

    io.out(formatReadingGuide(analysis));
    return EXIT_OK;
  },
};

/**
 * Run the CLI
 *
 * @returns Process exit code
 */
export async function run(argv: readonly string[], runOptions: RunOptions = {}): Promise<number> {
  const io = runOptions.io ?? consoleIO;
  const cwd = runOptions.cwd ?? process.cwd();
  const parsed = parseArgs(argv);

  if (!parsed.ok) {
    io.err(formatError(parsed.error));
    io.err(USAGE);
    return EXIT_USAGE;
  }

  if (parsed.options.help || !parsed.command) {
    io.out(USAGE);
    return EXIT_OK;
  }

  try {
    const catalogOptions: CatalogOptions = { homeDir: runOptions.homeDir, env: runOptions.env };
    const catalog = parsed.options.root
      ? await SkillCatalog.open(path.resolve(cwd, parsed.options.root), catalogOptions)
      : await SkillCatalog.open(cwd, { ...catalogOptions, findRoot: true });

    return await handlers[parsed.command]({
      catalog,
      args: parsed.positionals,
      options: parsed.options,
      io,
    });
  } catch (error) {
    if (!isSkillbookError(error)) throw error;
    io.err(formatError(error.message));
    return EXIT_FAILURE;
  }
}
