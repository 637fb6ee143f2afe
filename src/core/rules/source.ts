/**
 * Rule sources supply raw documents; the engine never touches storage itself.
 */
import * as path from 'node:path';
import { globFiles, isDirectory, readFile, toRulePath } from '../../utils/file-system.js';
import { SystemError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

const log = logger.child('source');

export const DEFAULT_RULE_PATTERNS = ['**/*.{mdc,md,json,yaml,yml,txt}'];
export const DEFAULT_RULE_EXCLUDES = ['**/node_modules/**', '**/.git/**'];

/**
 * Anything that can produce raw rule documents keyed by rule path.
 */
export interface RuleSource {
  /** Human-readable location, for logs and CLI output */
  describe(): string;
  load(): Promise<Map<string, string>>;
}

export interface DirectoryRuleSourceOptions {
  include?: string[];
  exclude?: string[];
}

/**
 * Reads every rule file under a directory. Rule paths are relative to the
 * directory and slash-delimited (`agents/base.mdc`).
 */
export class DirectoryRuleSource implements RuleSource {
  private readonly root: string;
  private readonly include: string[];
  private readonly exclude: string[];

  constructor(root: string, options: DirectoryRuleSourceOptions = {}) {
    this.root = path.resolve(root);
    this.include = options.include ?? DEFAULT_RULE_PATTERNS;
    this.exclude = options.exclude ?? DEFAULT_RULE_EXCLUDES;
  }

  describe(): string {
    return this.root;
  }

  async load(): Promise<Map<string, string>> {
    if (!(await isDirectory(this.root))) {
      throw new SystemError(
        ErrorCodes.READ_ERROR,
        `Rules directory not found: ${this.root}`,
        { root: this.root }
      );
    }

    const files = await globFiles(this.include, {
      cwd: this.root,
      ignore: this.exclude,
      absolute: false,
    });

    const documents = new Map<string, string>();
    for (const file of files) {
      documents.set(toRulePath(this.root, file), await readFile(path.join(this.root, file)));
    }

    log.debug(`Read ${documents.size} rule file(s) from ${this.root}`);
    return documents;
  }
}

/**
 * Serves documents held in memory. Useful for hosts that receive rules over
 * their own transport, and for tests.
 */
export class InMemoryRuleSource implements RuleSource {
  private readonly documents: Map<string, string>;

  constructor(documents: Record<string, string> | Map<string, string>) {
    this.documents = new Map(documents instanceof Map ? documents : Object.entries(documents));
  }

  describe(): string {
    return `memory (${this.documents.size} document(s))`;
  }

  async load(): Promise<Map<string, string>> {
    return new Map(this.documents);
  }
}
