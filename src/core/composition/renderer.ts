/**
 * Render a composition result for output.
 */
import { stringifyYaml } from '../../utils/yaml.js';
import { CONTROL_KEYS, type MetadataValue } from '../rules/types.js';
import { DEFAULT_SECTION } from '../rules/parser.js';
import type { CompositionResult, RenderFormat } from './types.js';

export function renderComposition(result: CompositionResult, format: RenderFormat): string {
  switch (format) {
    case 'markdown':
      return renderMarkdown(result);
    case 'json':
      return JSON.stringify(toPlainObject(result), null, 2);
    case 'yaml':
      return stringifyYaml(toPlainObject(result));
  }
}

/**
 * A standalone markdown document: frontmatter for the composed metadata
 * without control keys, then the default section without a heading, then the
 * others under title-cased `#` headings.
 */
export function renderMarkdown(result: CompositionResult): string {
  const parts: string[] = [];

  const frontmatter = new Map([...result.composedMetadata].filter(([key]) => !CONTROL_KEYS.has(key)));
  if (frontmatter.size > 0) {
    parts.push(`---\n${stringifyYaml(metadataObject(frontmatter))}---`);
  }

  const content = result.composedSections.get(DEFAULT_SECTION);
  if (content !== undefined) {
    parts.push(content);
  }
  for (const [name, text] of result.composedSections) {
    if (name !== DEFAULT_SECTION) {
      parts.push(`# ${sectionTitle(name)}\n\n${text}`);
    }
  }

  return `${parts.join('\n\n')}\n`;
}

/**
 * `code_style` -> `Code Style`
 */
export function sectionTitle(name: string): string {
  return name
    .split('_')
    .filter((word) => word !== '')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

function metadataObject(metadata: ReadonlyMap<string, MetadataValue>): Record<string, MetadataValue> {
  return Object.fromEntries(metadata);
}

/**
 * JSON-safe view of a result (maps become objects, insertion order kept).
 */
export function toPlainObject(result: CompositionResult): Record<string, unknown> {
  return {
    rule: result.rulePath,
    type: result.ruleType ?? null,
    success: result.success,
    chain: [...result.chain],
    links: result.links.map((link) => ({ ...link })),
    metadata: metadataObject(result.composedMetadata),
    variables: [...result.variableKeys],
    sections: Object.fromEntries(result.composedSections),
    conflicts: result.conflicts.map((conflict) => ({ ...conflict })),
    warnings: [...result.warnings],
  };
}
