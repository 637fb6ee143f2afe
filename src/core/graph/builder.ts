/**
 * Builds the rule hierarchy graph and formats it for output.
 */
import type { InheritanceResolver } from '../inheritance/resolver.js';
import type { RuleSet } from '../rules/types.js';
import type { GraphEdge, GraphFormat, GraphNode, GraphOptions, HierarchyGraph } from './types.js';

const TYPE_COLOURS: Record<string, string> = {
  agent: '#e1f5fe',
  context: '#f3e5f5',
  workflow: '#e8f5e9',
  general: '#fff8e1',
  missing: '#eeeeee',
};

export class GraphBuilder {
  constructor(private readonly resolver: InheritanceResolver) {}

  /**
   * Build the graph for a rule set.
   */
  build(rules: RuleSet, options: GraphOptions = {}): HierarchyGraph {
    const showReferences = options.showReferences ?? true;
    const inheritance = this.resolver.buildEdges(rules);
    const included = this.selectRules(rules, inheritance, options.root ?? '', options.maxDepth ?? Infinity);

    const nodes: GraphNode[] = [];
    const edges: GraphEdge[] = [];
    const nodeSet = new Set<string>();

    for (const path of included) {
      const rule = rules.get(path);
      if (!rule) continue;
      nodeSet.add(path);
      nodes.push({ id: path, label: path, ruleType: rule.ruleType, type: 'rule' });
    }

    for (const edge of inheritance) {
      if (nodeSet.has(edge.parentPath) && nodeSet.has(edge.childPath)) {
        edges.push({
          from: edge.parentPath,
          to: edge.childPath,
          type: 'inherits',
          inheritanceType: edge.inheritanceType,
        });
      }
    }

    if (showReferences) {
      for (const path of included) {
        const rule = rules.get(path);
        if (!rule) continue;
        for (const target of rule.references) {
          if (target === path) continue;
          if (!nodeSet.has(target)) {
            // A reference to a loaded rule outside the selected subtree is left out
            if (rules.has(target)) continue;
            nodeSet.add(target);
            nodes.push({ id: target, label: target, type: 'missing' });
          }
          edges.push({ from: path, to: target, type: 'references' });
        }
      }
    }

    return { nodes, edges };
  }

  /**
   * Format graph as string output.
   */
  format(graph: HierarchyGraph, format: GraphFormat): string {
    switch (format) {
      case 'mermaid':
        return this.formatMermaid(graph);
      case 'graphviz':
        return this.formatGraphviz(graph);
      case 'json':
        return JSON.stringify(graph, null, 2);
    }
  }

  /**
   * Rule paths to include: everything, or `root` and its descendants.
   */
  private selectRules(
    rules: RuleSet,
    inheritance: ReadonlyArray<{ childPath: string; parentPath: string }>,
    root: string,
    maxDepth: number
  ): string[] {
    if (!root) {
      return [...rules.keys()];
    }
    if (!rules.has(root)) {
      return [];
    }

    const children = new Map<string, string[]>();
    for (const edge of inheritance) {
      const list = children.get(edge.parentPath) ?? [];
      list.push(edge.childPath);
      children.set(edge.parentPath, list);
    }

    const result: string[] = [];
    const visited = new Set<string>();
    const queue: Array<{ path: string; depth: number }> = [{ path: root, depth: 0 }];

    while (queue.length > 0) {
      const next = queue.shift();
      if (!next || visited.has(next.path) || next.depth > maxDepth) continue;
      visited.add(next.path);
      result.push(next.path);
      for (const child of children.get(next.path) ?? []) {
        queue.push({ path: child, depth: next.depth + 1 });
      }
    }

    return result;
  }

  /**
   * Format graph as Mermaid flowchart.
   */
  private formatMermaid(graph: HierarchyGraph): string {
    const id = nodeIds(graph);
    const lines: string[] = ['graph TD'];

    for (const node of graph.nodes) {
      lines.push(`    ${id(node.id)}["${escapeLabel(node.label)}"]`);
    }

    for (const edge of graph.edges) {
      const from = id(edge.from);
      const to = id(edge.to);
      if (edge.type === 'references') {
        lines.push(`    ${from} -.-> ${to}`);
      } else if (edge.inheritanceType && edge.inheritanceType !== 'full') {
        lines.push(`    ${from} -->|${edge.inheritanceType}| ${to}`);
      } else {
        lines.push(`    ${from} --> ${to}`);
      }
    }

    const byClass = new Map<string, string[]>();
    for (const node of graph.nodes) {
      const cls = node.ruleType ?? node.type;
      const list = byClass.get(cls) ?? [];
      list.push(id(node.id));
      byClass.set(cls, list);
    }

    if (byClass.size > 0) {
      lines.push('');
      for (const [cls, ids] of byClass) {
        lines.push(`    classDef ${cls} fill:${TYPE_COLOURS[cls] ?? '#ffffff'}`);
        lines.push(`    class ${ids.join(',')} ${cls}`);
      }
    }

    return lines.join('\n');
  }

  /**
   * Format graph as Graphviz DOT.
   */
  private formatGraphviz(graph: HierarchyGraph): string {
    const id = nodeIds(graph);
    const lines: string[] = [
      'digraph rules {',
      '    rankdir=TB;',
      '    node [shape=box, style=filled];',
      '',
    ];

    for (const node of graph.nodes) {
      const fill = TYPE_COLOURS[node.ruleType ?? node.type] ?? '#ffffff';
      const shape = node.type === 'missing' ? 'ellipse' : 'box';
      lines.push(
        `    ${id(node.id)} [label="${escapeLabel(node.label)}", fillcolor="${fill}", shape=${shape}];`
      );
    }

    lines.push('');

    for (const edge of graph.edges) {
      const attrs: string[] = [];
      if (edge.type === 'references') attrs.push('style=dashed');
      if (edge.inheritanceType && edge.inheritanceType !== 'full') attrs.push(`label="${edge.inheritanceType}"`);
      const suffix = attrs.length > 0 ? ` [${attrs.join(', ')}]` : '';
      lines.push(`    ${id(edge.from)} -> ${id(edge.to)}${suffix};`);
    }

    lines.push('}');
    return lines.join('\n');
  }
}

/**
 * Map rule paths to `n0`, `n1`, ... in node order. Paths stay in the labels,
 * so distinct paths never share an identifier.
 */
function nodeIds(graph: HierarchyGraph): (path: string) => string {
  const ids = new Map<string, string>();
  for (const node of graph.nodes) {
    if (!ids.has(node.id)) ids.set(node.id, `n${ids.size}`);
  }
  return (path) => {
    let id = ids.get(path);
    if (id === undefined) {
      id = `n${ids.size}`;
      ids.set(path, id);
    }
    return id;
  };
}

function escapeLabel(label: string): string {
  return label.replace(/"/g, '\\"');
}
