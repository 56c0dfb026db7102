import type { CstNode } from 'chevrotain';
import type { AnnotatedLayout, DotAttributes, LayoutEdgeRecord, LayoutNodeRecord } from './types.js';
import { childNode, childNodes, hasToken, idText, unescapeQuotes } from './cst-utils.js';

type Scope = {
  nodeDefaults: DotAttributes;
  edgeDefaults: DotAttributes;
  graphAttrs: DotAttributes;
  members: Set<string>;
};

type PendingEdge = { tail: string; head: string; attributes: DotAttributes };

/**
 * Walks a DOT CST and collects the positioned nodes and edges the layout engine emitted
 */
export class LayoutBuilder {
  private nodes: Map<string, DotAttributes> = new Map();
  private edges: PendingEdge[] = [];
  private scopes: Scope[] = [];
  // One slot per subgraph, reserved when it opens so outer clusters draw beneath inner ones
  private clusterDraws: string[][] = [];

  build(cst: CstNode): AnnotatedLayout {
    this.reset();

    const root = this.openScope();
    const body = childNode(cst, 'stmtList');
    if (body) this.processStatements(body);
    this.scopes.pop();

    const drawAttributes: string[] = [];
    for (const key of ['_draw_', '_ldraw_']) {
      const value = root.graphAttrs[key];
      if (value !== undefined) drawAttributes.push(value);
    }
    for (const slot of this.clusterDraws) drawAttributes.push(...slot);

    const name = childNode(cst, 'id');
    return {
      name: name ? unescapeQuotes(idText(name)) : undefined,
      directed: hasToken(cst, 'DigraphKeyword'),
      strict: hasToken(cst, 'StrictKeyword'),
      bb: root.graphAttrs.bb,
      drawAttributes,
      nodes: Array.from(this.nodes.entries()).map(([nodeName, attrs]) => toNodeRecord(nodeName, attrs)),
      edges: this.edges.map(toEdgeRecord),
    };
  }

  private reset() {
    this.nodes.clear();
    this.edges = [];
    this.scopes = [];
    this.clusterDraws = [];
  }

  private get scope(): Scope {
    const top = this.scopes[this.scopes.length - 1];
    if (!top) throw new Error('statement outside of any graph scope');
    return top;
  }

  // Subgraphs inherit node and edge defaults, but not graph attributes
  private openScope(): Scope {
    const parent = this.scopes[this.scopes.length - 1];
    const scope: Scope = {
      nodeDefaults: { ...(parent?.nodeDefaults ?? {}) },
      edgeDefaults: { ...(parent?.edgeDefaults ?? {}) },
      graphAttrs: {},
      members: new Set(),
    };
    this.scopes.push(scope);
    return scope;
  }

  private processStatements(stmtList: CstNode) {
    for (const stmt of childNodes(stmtList, 'statement')) {
      const attrStmt = childNode(stmt, 'attrStatement');
      if (attrStmt) {
        this.processAttrStatement(attrStmt);
        continue;
      }
      const subgraphStmt = childNode(stmt, 'subgraphStatement');
      if (subgraphStmt) {
        this.processSubgraphStatement(subgraphStmt);
        continue;
      }
      const idStmt = childNode(stmt, 'idStatement');
      if (idStmt) this.processIdStatement(idStmt);
    }
  }

  private processAttrStatement(stmt: CstNode) {
    const attrs = readAttributes(childNode(stmt, 'attrList'));
    if (hasToken(stmt, 'GraphKeyword')) Object.assign(this.scope.graphAttrs, attrs);
    else if (hasToken(stmt, 'NodeKeyword')) Object.assign(this.scope.nodeDefaults, attrs);
    else if (hasToken(stmt, 'EdgeKeyword')) Object.assign(this.scope.edgeDefaults, attrs);
  }

  private processSubgraphStatement(stmt: CstNode) {
    const subgraph = childNode(stmt, 'subgraph');
    const members = subgraph ? this.processSubgraph(subgraph) : [];
    const rhs = childNode(stmt, 'edgeRhs');
    if (rhs) this.processEdgeChain(members, rhs, readAttributes(childNode(stmt, 'attrList')));
  }

  private processIdStatement(stmt: CstNode) {
    const nodeId = childNode(stmt, 'nodeId');
    const name = nodeName(nodeId);

    if (hasToken(stmt, 'Equals')) {
      this.scope.graphAttrs[name] = idText(childNode(stmt, 'value'));
      return;
    }

    const attrs = readAttributes(childNode(stmt, 'attrList'));
    const rhs = childNode(stmt, 'edgeRhs');
    if (rhs) {
      this.declareNode(name, {});
      this.processEdgeChain([name], rhs, attrs);
    } else {
      this.declareNode(name, attrs);
    }
  }

  private processSubgraph(subgraph: CstNode): string[] {
    const slot: string[] = [];
    this.clusterDraws.push(slot);
    const scope = this.openScope();
    const body = childNode(subgraph, 'stmtList');
    if (body) this.processStatements(body);
    this.scopes.pop();
    for (const key of ['_draw_', '_ldraw_']) {
      const value = scope.graphAttrs[key];
      if (value !== undefined) slot.push(value);
    }
    return Array.from(scope.members);
  }

  // a -> b -> {c d}: every node of one operand connects to every node of the next
  private processEdgeChain(first: string[], rhs: CstNode, explicit: DotAttributes) {
    const attributes = { ...this.scope.edgeDefaults, ...explicit };
    const operands: string[][] = [first];
    for (const endpoint of childNodes(rhs, 'endpoint')) {
      const subgraph = childNode(endpoint, 'subgraph');
      if (subgraph) {
        operands.push(this.processSubgraph(subgraph));
        continue;
      }
      const name = nodeName(childNode(endpoint, 'nodeId'));
      this.declareNode(name, {});
      operands.push([name]);
    }
    for (let i = 0; i + 1 < operands.length; i++) {
      for (const tail of operands[i] ?? []) {
        for (const head of operands[i + 1] ?? []) {
          this.edges.push({ tail, head, attributes: { ...attributes } });
        }
      }
    }
  }

  // Defaults apply when a node is first seen; later statements only add explicit attributes
  private declareNode(name: string, explicit: DotAttributes) {
    let attrs = this.nodes.get(name);
    if (!attrs) {
      attrs = { ...this.scope.nodeDefaults };
      this.nodes.set(name, attrs);
    }
    Object.assign(attrs, explicit);
    for (const scope of this.scopes) scope.members.add(name);
  }
}

function nodeName(nodeId: CstNode | undefined): string {
  return nodeId ? unescapeQuotes(idText(childNode(nodeId, 'id'))) : '';
}

function readAttributes(attrList: CstNode | undefined): DotAttributes {
  const attrs: DotAttributes = {};
  if (!attrList) return attrs;
  for (const attribute of childNodes(attrList, 'attribute')) {
    attrs[idText(childNode(attribute, 'name'))] = idText(childNode(attribute, 'value'));
  }
  return attrs;
}

function toNodeRecord(name: string, attrs: DotAttributes): LayoutNodeRecord {
  const url = attrs.URL ?? attrs.href;
  return {
    name,
    pos: attrs.pos,
    width: attrs.width,
    height: attrs.height,
    url: url !== undefined ? unescapeQuotes(url) : undefined,
    draw: attrs._draw_,
    ldraw: attrs._ldraw_,
    attributes: attrs,
  };
}

function toEdgeRecord(edge: PendingEdge): LayoutEdgeRecord {
  const attrs = edge.attributes;
  return {
    tail: edge.tail,
    head: edge.head,
    pos: attrs.pos,
    draw: attrs._draw_,
    ldraw: attrs._ldraw_,
    hdraw: attrs._hdraw_,
    tdraw: attrs._tdraw_,
    hldraw: attrs._hldraw_,
    tldraw: attrs._tldraw_,
    attributes: attrs,
  };
}
