/**
 * Binds template corpus entries to their conditional rules.
 */
import { minimatch } from 'minimatch';
import { TemplateError, ErrorCodes } from '../../utils/errors.js';
import { predicateFromSource } from '../predicates/parser.js';
import { checkPredicate } from '../predicates/checker.js';
import { compileTemplate } from '../template/parser.js';
import { checkTemplate } from '../template/checker.js';
import type { SignatureLookup } from '../values/types.js';
import type { BlueprintSettings, FileRuleSpec } from './schema.js';
import type { FileDescriptor, FileRule } from './types.js';

/** A file read from the template directory. */
export interface CorpusEntry {
  /** Path relative to the template directory, forward slashes */
  sourcePath: string;
  content: string;
}

const GLOB_OPTIONS = { dot: true } as const;

export function compileRules(specs: readonly FileRuleSpec[], lookup: SignatureLookup): FileRule[] {
  return specs.map((spec) => {
    const origin = `rule for '${spec.path}'`;
    const when = predicateFromSource(spec.when, origin);
    checkPredicate(when, lookup, origin);
    return { glob: spec.path, when, condition: String(spec.when) };
  });
}

/**
 * Compile corpus entries into file descriptors sorted by corpus path.
 * Every rule must match at least one file.
 */
export function buildCorpus(
  entries: readonly CorpusEntry[],
  settings: BlueprintSettings,
  rules: readonly FileRule[],
  lookup: SignatureLookup
): FileDescriptor[] {
  const suffix = settings.template_suffix;
  const files: FileDescriptor[] = [];
  const seen = new Map<string, string>();

  for (const entry of entries) {
    const isTemplate = suffix === '' || entry.sourcePath.endsWith(suffix);
    const path = isTemplate && suffix !== '' ? entry.sourcePath.slice(0, -suffix.length) : entry.sourcePath;

    if (path === '' || path.endsWith('/')) {
      throw new TemplateError(
        ErrorCodes.TEMPLATE_SYNTAX,
        `Template file '${entry.sourcePath}' has no name once '${suffix}' is removed`,
        { origin: entry.sourcePath }
      );
    }

    if (settings.exclude.some((pattern) => minimatch(path, pattern, GLOB_OPTIONS))) {
      continue;
    }

    const clash = seen.get(path);
    if (clash !== undefined) {
      throw new TemplateError(
        ErrorCodes.DUPLICATE_PATH,
        `Template files '${clash}' and '${entry.sourcePath}' both produce '${path}'`,
        { path, sources: [clash, entry.sourcePath] }
      );
    }
    seen.set(path, entry.sourcePath);

    const target = compileTemplate(path, `path '${path}'`);
    checkTemplate(target, lookup);

    const base = {
      path,
      sourcePath: entry.sourcePath,
      target,
      rules: rules.filter((rule) => minimatch(path, rule.glob, GLOB_OPTIONS)),
    };

    if (isTemplate) {
      const template = compileTemplate(entry.content, entry.sourcePath);
      checkTemplate(template, lookup);
      files.push({ ...base, kind: 'template', template });
    } else {
      files.push({ ...base, kind: 'verbatim', content: entry.content });
    }
  }

  for (const rule of rules) {
    if (!files.some((file) => file.rules.includes(rule))) {
      throw new TemplateError(
        ErrorCodes.RULE_MATCHES_NOTHING,
        `File rule '${rule.glob}' (when: ${rule.condition}) matches no template file`,
        { glob: rule.glob }
      );
    }
  }

  return files.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
}
