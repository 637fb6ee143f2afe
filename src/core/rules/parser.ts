/**
 * Rule document parser.
 *
 * parseRule() never throws: malformed frontmatter, JSON or YAML degrade to a
 * single raw `content` section with a parse warning, so one bad file never
 * blocks the hierarchy build.
 */
import { parse as parseYamlDocument } from 'yaml';
import { computeChecksum } from '../../utils/checksum.js';
import {
  MetadataKeys,
  MetadataValueSchema,
  RuleTypeSchema,
  type MetadataValue,
  type ParsedRule,
  type RuleFormat,
  type RuleType,
} from './types.js';

/** Name of the implicit section holding text outside any heading. */
export const DEFAULT_SECTION = 'content';

const FRONTMATTER_PATTERN = /^---[ \t]*\r?\n(?:([\s\S]*?)\r?\n)?---[ \t]*(?:\r?\n|$)/;
const HEADING_PATTERN = /^(#{1,6})[ \t]+(.+?)(?:[ \t]+#+)?[ \t]*$/;
const FENCE_PATTERN = /^[ \t]*(```|~~~)/;
const MDC_LINK_PATTERN = /\[[^\]]*\]\(mdc:([^)\s]+)\)/g;
const IMPORT_PATTERN = /@import\s+"([^"]+)"/g;

const FORMAT_BY_EXTENSION: Record<string, RuleFormat> = {
  '.md': 'markdown',
  '.mdc': 'markdown',
  '.markdown': 'markdown',
  '.json': 'json',
  '.yaml': 'yaml',
  '.yml': 'yaml',
  '.txt': 'text',
};

/** Path words that imply a rule type when none is declared, highest priority first. */
const TYPE_HINTS: ReadonlyArray<readonly [ReadonlySet<string>, RuleType]> = [
  [new Set(['workflow', 'workflows']), 'workflow'],
  [new Set(['agent', 'agents']), 'agent'],
  [new Set(['context', 'contexts']), 'context'],
];

const BYTE_ORDER_MARK = '\uFEFF';

interface ExtractedDocument {
  sections: Map<string, string>;
  fields: Record<string, unknown>;
  warnings: string[];
}

/**
 * Parse one raw rule document.
 */
export function parseRule(path: string, rawContent: string): ParsedRule {
  const format = detectFormat(path);
  const extracted = extractDocument(format, rawContent);
  const { metadata, variableKeys, warnings: metadataWarnings } = buildMetadata(extracted.fields);
  const warnings = [...extracted.warnings, ...metadataWarnings];
  const ruleType = resolveRuleType(path, metadata, warnings);

  return {
    path,
    format,
    ruleType,
    sections: extracted.sections,
    metadata,
    variableKeys,
    references: extractReferences(rawContent),
    rawContent,
    checksum: computeChecksum(rawContent),
    parseWarnings: warnings,
  };
}

/**
 * Detect the document format from the path's extension.
 * Extension-less logical paths are treated as markdown.
 */
export function detectFormat(path: string): RuleFormat {
  const extension = extensionOf(path);
  if (!extension) return 'markdown';
  return FORMAT_BY_EXTENSION[extension] ?? 'text';
}

/**
 * Extension of the last path segment, lowercased, including the dot.
 */
export function extensionOf(path: string): string {
  const segment = path.slice(path.lastIndexOf('/') + 1);
  const dot = segment.lastIndexOf('.');
  return dot > 0 ? segment.slice(dot).toLowerCase() : '';
}

/**
 * Normalize a heading into a section name: `Coding Style` -> `coding_style`.
 */
export function normalizeSectionName(heading: string): string {
  return heading.trim().toLowerCase().replace(/\s+/g, '_');
}

function extractDocument(format: RuleFormat, content: string): ExtractedDocument {
  const rawContent = content.startsWith(BYTE_ORDER_MARK) ? content.slice(1) : content;
  switch (format) {
    case 'markdown':
      return extractMarkdown(rawContent);
    case 'json':
      return extractStructured(rawContent, 'JSON', (text) => JSON.parse(text));
    case 'yaml':
      return extractStructured(rawContent, 'YAML', (text) => parseYamlDocument(text));
    case 'text':
      return { sections: new Map([[DEFAULT_SECTION, rawContent]]), fields: {}, warnings: [] };
  }
}

function fallback(rawContent: string, reason: string): ExtractedDocument {
  return {
    sections: new Map([[DEFAULT_SECTION, rawContent]]),
    fields: {},
    warnings: [`${reason}; treating the document as a single '${DEFAULT_SECTION}' section`],
  };
}

function extractMarkdown(rawContent: string): ExtractedDocument {
  let body = rawContent;
  let fields: Record<string, unknown> = {};

  if (/^---[ \t]*\r?\n/.test(rawContent)) {
    const match = FRONTMATTER_PATTERN.exec(rawContent);
    if (!match) {
      return fallback(rawContent, 'Unterminated frontmatter');
    }
    let parsed: unknown;
    try {
      parsed = parseYamlDocument(match[1] ?? '');
    } catch (error) {
      return fallback(rawContent, `Invalid frontmatter: ${errorMessage(error)}`);
    }
    if (parsed !== null && parsed !== undefined && !isPlainObject(parsed)) {
      return fallback(rawContent, 'Frontmatter is not a key/value mapping');
    }
    fields = isPlainObject(parsed) ? parsed : {};
    body = rawContent.slice(match[0].length);
  }

  return { sections: splitSections(body), fields, warnings: [] };
}

/**
 * Split a markdown body into sections at ATX headings.
 * Headings inside fenced code blocks are ignored.
 */
function splitSections(body: string): Map<string, string> {
  const sections = new Map<string, string>();
  let current = DEFAULT_SECTION;
  let buffer: string[] = [];
  let inPreamble = true;
  let inFence = false;

  const flush = (): void => {
    const text = buffer.join('\n').trim();
    buffer = [];
    if (inPreamble && text === '') return;
    const existing = sections.get(current);
    if (existing === undefined) {
      sections.set(current, text);
    } else if (text !== '') {
      sections.set(current, existing === '' ? text : `${existing}\n\n${text}`);
    }
  };

  for (const line of body.split(/\r?\n/)) {
    if (FENCE_PATTERN.test(line)) {
      inFence = !inFence;
      buffer.push(line);
      continue;
    }
    const heading = inFence ? null : HEADING_PATTERN.exec(line);
    const name = heading ? normalizeSectionName(heading[2] ?? '') : '';
    if (heading && name !== '') {
      flush();
      current = name;
      inPreamble = false;
      continue;
    }
    buffer.push(line);
  }
  flush();

  if (sections.size === 0) {
    sections.set(DEFAULT_SECTION, '');
  }
  return sections;
}

function extractStructured(
  rawContent: string,
  label: string,
  decode: (text: string) => unknown
): ExtractedDocument {
  let parsed: unknown;
  try {
    parsed = decode(rawContent);
  } catch (error) {
    return fallback(rawContent, `Invalid ${label}: ${errorMessage(error)}`);
  }
  if (!isPlainObject(parsed)) {
    return fallback(rawContent, `${label} document is not an object`);
  }

  const { sections: rawSections, ...fields } = parsed;
  const warnings: string[] = [];
  const sections = new Map<string, string>();

  if (rawSections === undefined) {
    sections.set(DEFAULT_SECTION, rawContent);
  } else if (isPlainObject(rawSections)) {
    for (const [name, text] of Object.entries(rawSections)) {
      if (typeof text === 'string') {
        sections.set(normalizeSectionName(name), text.trim());
      } else {
        warnings.push(`Section '${name}' is not text and was skipped`);
      }
    }
    if (sections.size === 0) {
      sections.set(DEFAULT_SECTION, '');
    }
  } else {
    warnings.push(`'sections' must be a mapping of names to text`);
    sections.set(DEFAULT_SECTION, rawContent);
  }

  return { sections, fields, warnings };
}

/**
 * Turn loosely-typed document fields into typed metadata.
 * Top-level keys win over `variables` entries of the same name.
 */
function buildMetadata(fields: Record<string, unknown>): {
  metadata: Map<string, MetadataValue>;
  variableKeys: string[];
  warnings: string[];
} {
  const metadata = new Map<string, MetadataValue>();
  const variableKeys: string[] = [];
  const warnings: string[] = [];

  for (const [key, value] of Object.entries(fields)) {
    if (key === MetadataKeys.VARIABLES) continue;
    const normalized = toMetadataValue(value);
    if (normalized === undefined) {
      warnings.push(`Metadata key '${key}' has no value and was skipped`);
      continue;
    }
    metadata.set(key, normalized);
  }

  const variables = fields[MetadataKeys.VARIABLES];
  if (isPlainObject(variables)) {
    for (const [key, value] of Object.entries(variables)) {
      const normalized = toMetadataValue(value);
      if (normalized === undefined) {
        warnings.push(`Variable '${key}' has no value and was skipped`);
        continue;
      }
      if (metadata.has(key)) {
        warnings.push(`Variable '${key}' shadows a metadata key of the same name and was ignored`);
        continue;
      }
      metadata.set(key, normalized);
      variableKeys.push(key);
    }
  } else if (variables !== undefined && variables !== null) {
    warnings.push(`'${MetadataKeys.VARIABLES}' must be a mapping and was ignored`);
  }

  return { metadata, variableKeys, warnings };
}

/**
 * Coerce a decoded value into a MetadataValue.
 * Nested structures are kept as their JSON text; null yields undefined.
 */
export function toMetadataValue(value: unknown): MetadataValue | undefined {
  const result = MetadataValueSchema.safeParse(value);
  if (result.success) return result.data;
  if (value === null || value === undefined) return undefined;
  if (Array.isArray(value)) {
    return value.map((item: unknown) =>
      typeof item === 'object' && item !== null ? JSON.stringify(item) : String(item)
    );
  }
  return JSON.stringify(value);
}

function resolveRuleType(
  path: string,
  metadata: ReadonlyMap<string, MetadataValue>,
  warnings: string[]
): RuleType {
  const declared = metadata.get(MetadataKeys.TYPE);
  if (typeof declared === 'string') {
    const result = RuleTypeSchema.safeParse(declared.trim().toLowerCase());
    if (result.success) return result.data;
    warnings.push(`Unknown rule type '${declared}'; inferring from path`);
  } else if (declared !== undefined) {
    warnings.push(`Rule type must be text; inferring from path`);
  }
  return inferRuleType(path);
}

/**
 * Infer a rule type from the words of the path's directories and file stem,
 * defaulting to `general`. `agents/review.md` and `code-review-agent.md` are
 * agents; `docs/contextual-help.md` is not a context.
 */
export function inferRuleType(path: string): RuleType {
  const extension = extensionOf(path);
  const stem = extension ? path.slice(0, path.length - extension.length) : path;
  const words = new Set(
    stem
      .toLowerCase()
      .split(/[/\-_.\s]+/)
      .filter((word) => word !== '')
  );
  for (const [hints, ruleType] of TYPE_HINTS) {
    for (const hint of hints) {
      if (words.has(hint)) return ruleType;
    }
  }
  return 'general';
}

/**
 * Collect rule links from the document in first-seen order.
 */
export function extractReferences(content: string): string[] {
  const found = new Set<string>();
  for (const pattern of [MDC_LINK_PATTERN, IMPORT_PATTERN]) {
    for (const match of content.matchAll(pattern)) {
      const target = match[1];
      if (target) found.add(target);
    }
  }
  return [...found];
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
