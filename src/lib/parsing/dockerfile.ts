/**
 * Dockerfile reading for dependency pinning and build levels: ARG defaults and FROM instructions.
 *
 * Instructions come from docker-file-parser, which joins `\` continuation lines.
 */

import * as dockerParser from 'docker-file-parser';
import type { CommandEntry } from 'docker-file-parser';

export interface FromInstruction {
  /** Reference exactly as written, `${VAR}` placeholders included */
  raw: string;
  /** Reference after ARG default substitution */
  resolved: string;
  /** Stage name from `AS <name>` */
  stage?: string;
}

const VARIABLE_PATTERN = /\$\{(\w+)\}/g;
const QUOTED_VALUE = /^(["'])(.*)\1$/;

const parseCommands = (content: string): CommandEntry[] => dockerParser.parse(content, { includeComments: false });

const isInstruction = (entry: CommandEntry, name: string): boolean => entry.name.toUpperCase() === name;

/**
 * Whitespace-separated tokens of an instruction, whatever shape the parser gave its args
 */
const argTokens = (entry: CommandEntry): string[] => {
  const { args } = entry;
  if (typeof args === 'string') return args.split(/\s+/).filter(Boolean);
  if (Array.isArray(args)) return args.flatMap((arg) => arg.split(/\s+/)).filter(Boolean);
  return Object.entries(args).map(([name, value]) => `${name}=${value}`);
};

const unquote = (value: string): string => QUOTED_VALUE.exec(value)?.[2] ?? value;

/**
 * Image token and stage name of a FROM instruction, flags skipped
 */
const fromParts = (entry: CommandEntry): { image: string | undefined; stage: string | undefined } => {
  const [image, keyword, stage] = argTokens(entry).filter((token) => !token.startsWith('--'));
  return { image, stage: keyword?.toUpperCase() === 'AS' ? stage : undefined };
};

/**
 * Default values of `ARG NAME=value` instructions; later definitions win
 */
export function parseArgDefaults(content: string): Map<string, string> {
  const args = new Map<string, string>();
  for (const entry of parseCommands(content)) {
    if (!isInstruction(entry, 'ARG')) continue;
    for (const token of argTokens(entry)) {
      const separator = token.indexOf('=');
      if (separator <= 0) continue;
      args.set(token.slice(0, separator), unquote(token.slice(separator + 1).trim()));
    }
  }
  return args;
}

/**
 * Replace `${VAR}` with its ARG default; unknown variables stay as written
 */
export function resolveArgs(reference: string, args: ReadonlyMap<string, string>): string {
  return reference.replace(VARIABLE_PATTERN, (placeholder: string, name: string) => args.get(name) ?? placeholder);
}

export function parseFromInstructions(content: string): FromInstruction[] {
  const args = parseArgDefaults(content);
  const instructions: FromInstruction[] = [];

  for (const entry of parseCommands(content)) {
    if (!isInstruction(entry, 'FROM')) continue;
    const { image, stage } = fromParts(entry);
    if (!image) continue;

    const instruction: FromInstruction = {
      raw: image,
      resolved: resolveArgs(image, args),
    };
    if (stage) instruction.stage = stage;
    instructions.push(instruction);
  }

  return instructions;
}

/**
 * Image of the first FROM instruction, as written (used for build levels)
 */
export function firstBaseImage(content: string): string | undefined {
  const from = parseCommands(content).find((entry) => isInstruction(entry, 'FROM'));
  return from ? fromParts(from).image : undefined;
}
