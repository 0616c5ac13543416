/**
 * Skill Tools - Find, load and read skills from an agent runtime
 *
 * The tool descriptions list the registry entries so the model can pick
 * a skill without a lookup. Failures come back as unsuccessful results.
 */

import { z } from 'zod';
import type { Tool, ToolContext, ToolResult } from './types.js';
import type { SkillCatalog } from '../catalog.js';
import type { SkillRegistryEntry } from '../registry/types.js';
import type { SkillManifest } from '../skills/types.js';
import { formatBoxedMessage, formatList } from '../base/utils/format-utils.js';
import { getErrorMessage } from '../errors.js';
import { logger } from '../base/utils/logger.js';

export const FindSkillsInputSchema = z.object({
  intent: z.string().min(1).describe('Description of the task at hand'),
  limit: z.number().int().positive().optional().describe('Maximum number of candidates'),
});
export type FindSkillsInput = z.infer<typeof FindSkillsInputSchema>;

export const LoadSkillInputSchema = z.object({
  skill: z.string().min(1).describe('Skill name to load'),
});
export type LoadSkillInput = z.infer<typeof LoadSkillInputSchema>;

export const ReadSkillReferenceInputSchema = z.object({
  skill: z.string().min(1).describe('Skill that declares the reference'),
  path: z.string().min(1).describe('Reference path, e.g. references/java-spring.md'),
});
export type ReadSkillReferenceInput = z.infer<typeof ReadSkillReferenceInputSchema>;

export interface SkillTools {
  findSkills: Tool<FindSkillsInput>;
  loadSkill: Tool<LoadSkillInput>;
  readSkillReference: Tool<ReadSkillReferenceInput>;
}

function failure(error: unknown): ToolResult {
  return { success: false, output: '', error: getErrorMessage(error) };
}

/**
 * Bulleted registry listing for tool descriptions
 */
export function describeSkills(entries: readonly SkillRegistryEntry[]): string {
  return formatList(
    entries.map((entry) => `**${entry.name}** - ${entry.description}`),
    '(No skills available)'
  );
}

/**
 * Boxed header, manifest body and the references available on demand
 */
export function formatSkillActivation(manifest: SkillManifest): string {
  const fields: Record<string, string> = {
    Name: manifest.name,
    Description: manifest.description,
  };
  if (manifest.version) {
    fields['Version'] = manifest.version;
  }

  const lines = [formatBoxedMessage('Skill Loaded', fields), '', manifest.body];

  if (manifest.references.length > 0) {
    lines.push('', '---', '', 'References available on demand (ReadSkillReference):');
    lines.push(formatList(manifest.references));
  }

  return lines.join('\n');
}

export function createSkillTools(catalog: SkillCatalog): SkillTools {
  const entries = catalog.listSkills();
  const listing = describeSkills(entries);

  const findSkills: Tool<FindSkillsInput> = {
    name: 'FindSkills',
    description: [
      'Rank skills against a task description.',
      '',
      '**Available Skills:**',
      '',
      listing,
    ].join('\n'),
    parameters: FindSkillsInputSchema,

    async execute(input: FindSkillsInput, context: ToolContext): Promise<ToolResult> {
      logger.debug('tools', 'FindSkills', { intent: input.intent, sessionId: context.sessionId });

      try {
        const matches = await catalog.findSkillMatches(input.intent, { limit: input.limit });

        if (matches.length === 0) {
          return { success: true, output: 'No matching skills.' };
        }

        const lines = matches.map((match) => {
          const description = catalog.registry.get(match.name)?.description ?? '';
          return `${match.name} (${match.score.toFixed(2)}) - ${description}`;
        });
        return { success: true, output: lines.join('\n'), metadata: { title: `FindSkills(${input.intent})` } };
      } catch (error) {
        return failure(error);
      }
    },
  };

  const loadSkill: Tool<LoadSkillInput> = {
    name: 'LoadSkill',
    description: [
      'Load a skill manifest into context when the task matches its description.',
      '',
      '**Available Skills:**',
      '',
      listing,
    ].join('\n'),
    parameters: LoadSkillInputSchema,

    async execute(input: LoadSkillInput): Promise<ToolResult> {
      try {
        const manifest = await catalog.loadManifest(input.skill);
        const output = formatSkillActivation(manifest);
        return {
          success: true,
          output,
          metadata: { title: `LoadSkill(${manifest.name})`, subtitle: manifest.description, size: output.length },
        };
      } catch (error) {
        return failure(error);
      }
    },
  };

  const readSkillReference: Tool<ReadSkillReferenceInput> = {
    name: 'ReadSkillReference',
    description:
      'Read a reference document named by a loaded skill. Only paths the skill lists are available.',
    parameters: ReadSkillReferenceInputSchema,

    async execute(input: ReadSkillReferenceInput): Promise<ToolResult> {
      try {
        const document = await catalog.resolveReference(input.skill, input.path);
        return {
          success: true,
          output: document.content,
          metadata: { title: `ReadSkillReference(${input.skill}/${document.path})`, size: document.content.length },
        };
      } catch (error) {
        return failure(error);
      }
    },
  };

  return { findSkills, loadSkill, readSkillReference };
}
