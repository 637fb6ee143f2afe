/**
 * RuleOrchestrator - one orchestration session.
 *
 * Owns the composition cache and wires the resolver, engine, validator and
 * graph builder around it. Rule sets are passed in by the caller and never
 * mutated.
 */
import { CacheStore } from './cache/store.js';
import type { CacheStoreOptions, CacheStoreStats } from './cache/types.js';
import { CompositionEngine } from './composition/engine.js';
import { renderComposition } from './composition/renderer.js';
import type { CompositionResult, RenderFormat } from './composition/types.js';
import type { Config } from './config/schema.js';
import { GraphBuilder } from './graph/builder.js';
import type { GraphFormat, GraphOptions, HierarchyGraph } from './graph/types.js';
import { InheritanceResolver, type InheritanceResolverOptions } from './inheritance/resolver.js';
import type { InheritanceChain } from './inheritance/types.js';
import { resolveDependencies, type DependencyResolution } from './rules/dependencies.js';
import { loadHierarchy } from './rules/loader.js';
import type { RuleSource } from './rules/source.js';
import type { RawDocuments, RuleFormat, RuleSet, RuleType } from './rules/types.js';
import { HierarchyValidator } from './validation/validator.js';
import type { ValidationReport } from './validation/types.js';
import { logger as rootLogger } from '../utils/logger.js';

const log = rootLogger.child('orchestrator');

export interface RuleOrchestratorOptions {
  cache?: CacheStoreOptions;
  inheritance?: InheritanceResolverOptions;
}

/**
 * Overview of a loaded rule set.
 */
export interface HierarchySummary {
  totalRules: number;
  ruleTypes: Record<RuleType, number>;
  formats: Record<RuleFormat, number>;
  /** Rules without a parent, in load order */
  roots: string[];
  rulesWithInheritance: number;
  /** Rules whose document produced parse warnings */
  rulesWithWarnings: string[];
}

export class RuleOrchestrator {
  readonly resolver: InheritanceResolver;
  readonly engine: CompositionEngine;
  readonly validator: HierarchyValidator;
  readonly graph: GraphBuilder;
  private readonly cache: CacheStore<CompositionResult>;

  constructor(options: RuleOrchestratorOptions = {}) {
    this.cache = new CacheStore<CompositionResult>(options.cache);
    this.resolver = new InheritanceResolver(options.inheritance);
    this.engine = new CompositionEngine({ resolver: this.resolver, cache: this.cache });
    this.validator = new HierarchyValidator(this.engine);
    this.graph = new GraphBuilder(this.resolver);
  }

  /**
   * Build a session from loaded configuration.
   */
  static fromConfig(config: Config): RuleOrchestrator {
    return new RuleOrchestrator({
      cache: {
        maxSize: config.cache.max_size,
        defaultTtlMs: config.cache.default_ttl_seconds * 1000,
      },
      inheritance: {
        parentCandidates: config.inheritance.parent_candidates,
        searchAncestors: config.inheritance.search_ancestors,
      },
    });
  }

  loadHierarchy(rawDocuments: RawDocuments): RuleSet {
    return loadHierarchy(rawDocuments);
  }

  async loadFromSource(source: RuleSource): Promise<RuleSet> {
    log.debug(`Loading rules from ${source.describe()}`);
    return loadHierarchy(await source.load());
  }

  composeRule(rulePath: string, rules: RuleSet): CompositionResult {
    return this.engine.compose(rulePath, rules);
  }

  resolveInheritanceChain(rulePath: string, rules: RuleSet): InheritanceChain {
    return this.resolver.buildChain(rulePath, rules);
  }

  /**
   * Rules reachable through body references, dependencies first.
   */
  resolveDependencies(rulePath: string, rules: RuleSet): DependencyResolution {
    return resolveDependencies(rulePath, rules);
  }

  validateHierarchy(rules: RuleSet): ValidationReport {
    return this.validator.validate(rules);
  }

  cacheStatus(): CacheStoreStats {
    return this.engine.cacheStatus();
  }

  /**
   * Drop cached compositions of a rule whose source changed.
   */
  invalidateRule(rulePath: string): number {
    const removed = this.engine.invalidate(rulePath);
    log.debug(`Invalidated ${removed} cached composition(s) for ${rulePath}`);
    return removed;
  }

  render(result: CompositionResult, format: RenderFormat): string {
    return renderComposition(result, format);
  }

  buildGraph(rules: RuleSet, options: GraphOptions = {}): HierarchyGraph {
    return this.graph.build(rules, options);
  }

  formatGraph(graph: HierarchyGraph, format: GraphFormat): string {
    return this.graph.format(graph, format);
  }

  summarize(rules: RuleSet): HierarchySummary {
    const summary: HierarchySummary = {
      totalRules: rules.size,
      ruleTypes: { agent: 0, context: 0, workflow: 0, general: 0 },
      formats: { markdown: 0, json: 0, yaml: 0, text: 0 },
      roots: [],
      rulesWithInheritance: 0,
      rulesWithWarnings: [],
    };

    for (const rule of rules.values()) {
      summary.ruleTypes[rule.ruleType] += 1;
      summary.formats[rule.format] += 1;
      if (this.resolver.resolveParent(rule, rules) === undefined) {
        summary.roots.push(rule.path);
      } else {
        summary.rulesWithInheritance += 1;
      }
      if (rule.parseWarnings.length > 0) {
        summary.rulesWithWarnings.push(rule.path);
      }
    }

    return summary;
  }
}
