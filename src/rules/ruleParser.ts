import path from 'node:path';
import matter from 'gray-matter';
import { z } from 'zod';
import { type Rule, RULE_EVENTS, type RuleEvent } from '../types/rule';
import { errorMessage, type LoadError } from '../types/errors';

const PATTERN_REQUIRED: readonly RuleEvent[] = ['bash', 'file', 'commit'];
const PATH_GATED: readonly RuleEvent[] = ['file', 'stage', 'any'];

const RuleFrontmatterSchema = z
  .object({
    name: z.string().min(1).optional(),
    enabled: z.boolean().default(true),
    event: z.enum(['bash', 'file', 'stage', 'commit', 'any']),
    pattern: z.string().min(1).optional(),
    file_pattern: z.string().min(1).optional(),
    action: z.enum(['warn', 'block']),
  })
  .superRefine((data, ctx) => {
    if (PATTERN_REQUIRED.includes(data.event) && data.pattern === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['pattern'],
        message: `required for ${data.event} rules`,
      });
    }
  });

export type RuleFrontmatter = z.infer<typeof RuleFrontmatterSchema>;

export type ParseResult =
  | { ok: true; rule: Rule; ignoredFields: string[] }
  | { ok: false; error: LoadError };

const INLINE_FLAGS: Record<string, string> = { i: 'i', m: 'm', s: 's' };

/**
 * Compiles a rule expression. A leading inline group such as `(?i)` is
 * turned into the matching RegExp flags; no flags are added otherwise.
 */
export function compilePattern(source: string): RegExp {
  const inline = /^\(\?([a-zA-Z]+)\)/.exec(source);
  if (!inline) {
    return new RegExp(source);
  }
  let flags = '';
  for (const letter of inline[1]) {
    const flag = INLINE_FLAGS[letter];
    if (!flag) {
      throw new Error(`unsupported inline flag "${letter}"`);
    }
    if (!flags.includes(flag)) {
      flags += flag;
    }
  }
  return new RegExp(source.slice(inline[0].length), flags);
}

function loadError(file: string, message: string, field?: string): ParseResult {
  return { ok: false, error: { kind: 'load', file, field, message } };
}

export function parseRuleDocument(content: string, filePath: string): ParseResult {
  if (!matter.test(content)) {
    return loadError(filePath, 'missing frontmatter block');
  }

  let data: unknown;
  let body: string;
  try {
    const parsed = matter(content);
    data = parsed.data;
    body = parsed.content;
  } catch (error) {
    return loadError(filePath, `invalid frontmatter: ${errorMessage(error)}`);
  }

  const result = RuleFrontmatterSchema.safeParse(data);
  if (!result.success) {
    const [first, ...rest] = result.error.issues;
    const field = first.path.length > 0 ? first.path.join('.') : undefined;
    // The first issue is named by `field`; later ones carry their own path.
    const message = [
      first.message,
      ...rest.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message)),
    ].join('; ');
    return loadError(filePath, message, field);
  }

  const frontmatter = result.data;
  const ignoredFields: string[] = [];

  let pattern: RegExp | undefined;
  if (frontmatter.pattern !== undefined) {
    try {
      pattern = compilePattern(frontmatter.pattern);
    } catch (error) {
      return loadError(filePath, `invalid regular expression: ${errorMessage(error)}`, 'pattern');
    }
  }

  let filePattern: RegExp | undefined;
  if (frontmatter.file_pattern !== undefined) {
    if (PATH_GATED.includes(frontmatter.event)) {
      try {
        filePattern = compilePattern(frontmatter.file_pattern);
      } catch (error) {
        return loadError(filePath, `invalid regular expression: ${errorMessage(error)}`, 'file_pattern');
      }
    } else {
      // Paths never reach bash or commit events.
      ignoredFields.push('file_pattern');
    }
  }

  const rule: Rule = {
    id: frontmatter.name ?? path.basename(filePath, '.md'),
    enabled: frontmatter.enabled,
    event: frontmatter.event,
    action: frontmatter.action,
    pattern,
    filePattern,
    message: body.trim(),
    source: filePath,
  };

  return { ok: true, rule, ignoredFields };
}

export function isRuleEvent(value: string): value is RuleEvent {
  return (RULE_EVENTS as readonly string[]).includes(value);
}
