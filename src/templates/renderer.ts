import * as fs from 'fs';
import * as path from 'path';
import { TemplateIOError } from '../errors.js';
import { LogLevel, type LogFn } from '../logger.js';

export const TEMPLATE_SUFFIX = '.template';
export const MASTERS_FILE = 'masters';
export const WORKERS_FILE = 'slaves';

export interface RenderOptions {
  templateDir: string;
  outputDir: string;
  substitutions: ReadonlyMap<string, string>;
  master: string;
  workers: readonly string[];
  log: LogFn;
}

function escapeRegExp(literal: string): string {
  return literal.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// Single pass over the line; tokens that are not table keys are copied through as-is.
export function createSubstituter(substitutions: ReadonlyMap<string, string>): (line: string) => string {
  if (substitutions.size === 0) {
    return line => line;
  }

  const pattern = new RegExp(Array.from(substitutions.keys(), escapeRegExp).join('|'), 'g');
  return line => line.replace(pattern, match => substitutions.get(match) ?? match);
}

export function renderTemplate(content: string, substitute: (line: string) => string): string {
  const lines = content.split('\n');
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines.map(line => substitute(line.trimEnd()) + '\n').join('');
}

function listTemplates(templateDir: string): string[] {
  try {
    return fs.readdirSync(templateDir)
      .filter(name => !name.startsWith('.') && name.endsWith(TEMPLATE_SUFFIX))
      .sort();
  } catch (err) {
    throw new TemplateIOError(`Cannot list templates in ${templateDir}`, templateDir, err);
  }
}

function readFile(filePath: string): string {
  try {
    return fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new TemplateIOError(`Cannot read template ${filePath}`, filePath, err);
  }
}

function writeFile(filePath: string, content: string): void {
  try {
    fs.writeFileSync(filePath, content);
  } catch (err) {
    throw new TemplateIOError(`Cannot write ${filePath}`, filePath, err);
  }
}

// Renders each non-hidden *.template file, then the host lists. Returns the names written.
export function renderTemplates(options: RenderOptions): string[] {
  const { templateDir, outputDir, substitutions, master, workers, log } = options;
  const substitute = createSubstituter(substitutions);
  const written: string[] = [];

  for (const templateName of listTemplates(templateDir)) {
    const outputName = templateName.slice(0, -TEMPLATE_SUFFIX.length);
    log(LogLevel.Detail, `Generating file "${outputName}"...`);
    const content = readFile(path.join(templateDir, templateName));
    writeFile(path.join(outputDir, outputName), renderTemplate(content, substitute));
    written.push(outputName);
  }

  log(LogLevel.Detail, `Generating file "${MASTERS_FILE}"...`);
  writeFile(path.join(outputDir, MASTERS_FILE), `${master}\n`);
  written.push(MASTERS_FILE);

  log(LogLevel.Detail, `Generating file "${WORKERS_FILE}"...`);
  writeFile(path.join(outputDir, WORKERS_FILE), workers.map(worker => `${worker}\n`).join(''));
  written.push(WORKERS_FILE);

  return written;
}
