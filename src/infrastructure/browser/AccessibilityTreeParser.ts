import { z } from 'zod';
import { ACTIONABLE_ROLES, ElementRecord } from '../../domain/browser/ElementRecord';

/**
 * Roles that only carry text runs or layout and are never listed.
 * Compared lowercased: CDP reports `StaticText`, `InlineTextBox`.
 */
export const IGNORED_AX_ROLES: ReadonlySet<string> = new Set([
  'text',
  'statictext',
  'inlinetextbox',
  'linebreak',
  'paragraph',
]);

const NAME_SELECTOR_LIMIT = 50;
const SAFE_NAME_LIMIT = 40;
const TEXT_LIMIT = 120;

const NodeIdSchema = z.union([z.string(), z.number()]).transform(id => String(id));

const AXValueSchema = z.union([
  z.string(),
  z.object({ type: z.string().optional(), value: z.unknown().optional() }).passthrough(),
]);

const AXNodeSchema = z
  .object({
    nodeId: NodeIdSchema.optional(),
    role: AXValueSchema.optional(),
    name: AXValueSchema.optional(),
    value: AXValueSchema.optional(),
    childIds: z.array(NodeIdSchema).optional(),
    boundingBox: z
      .object({ x: z.number(), y: z.number(), width: z.number(), height: z.number() })
      .nullable()
      .optional(),
    properties: z
      .array(z.object({ name: z.string(), value: AXValueSchema.optional() }).passthrough())
      .optional(),
  })
  .passthrough();

type AXNode = z.infer<typeof AXNodeSchema>;
type AXValue = z.infer<typeof AXValueSchema>;

export interface AXParseStats {
  processed: number;
  skipped: number;
  actionable: number;
  noBbox: number;
  noText: number;
}

export interface AXParseResult {
  elements: ElementRecord[];
  stats: AXParseStats;
}

function valueString(value: AXValue | undefined): string {
  if (typeof value === 'string') {
    return value;
  }
  return typeof value?.value === 'string' ? value.value : '';
}

/**
 * The role lives in `value`; `type` only names the role kind.
 */
function roleOf(node: AXNode): string {
  const role = node.role;
  if (typeof role === 'string') {
    return role;
  }
  if (typeof role?.value === 'string' && role.value !== '') {
    return role.value;
  }
  if (role?.type && role.type !== 'role' && role.type !== 'internalRole') {
    return role.type;
  }
  return '';
}

function inputTypeOf(node: AXNode): string {
  const property = node.properties?.find(p => p.name === 'inputType');
  return valueString(property?.value) || 'text';
}

function safeName(name: string): string {
  return name.replace(/"/g, "'").replace(/\n/g, ' ').slice(0, SAFE_NAME_LIMIT);
}

/**
 * Synthesizes a CSS selector from role and accessible name.
 */
export function axSelector(role: string, name: string, inputType = 'text'): string {
  const usable = name !== '' && name.length < NAME_SELECTOR_LIMIT;
  if (role === 'textbox') {
    if (usable) {
      const safe = safeName(name);
      return `input[type="${inputType}"][aria-label*="${safe}"], [role="textbox"][aria-label*="${safe}"]`;
    }
    return `input[type="${inputType}"], [role="textbox"]`;
  }
  if (usable) {
    return `[role="${role}"][aria-label*="${safeName(name)}"]`;
  }
  return `[role="${role}"]`;
}

function bboxOf(node: AXNode): string {
  const box = node.boundingBox;
  if (!box || (box.x === 0 && box.y === 0 && box.width === 0 && box.height === 0)) {
    return '';
  }
  return [box.x, box.y, box.width, box.height].map(n => Math.round(n)).join(',');
}

/**
 * Depth of every node, by breadth-first traversal from the parentless roots.
 */
function computeDepths(nodes: AXNode[], parents: Map<string, string>): Map<string, number> {
  const children = new Map<string, string[]>();
  for (const node of nodes) {
    if (node.nodeId && node.childIds) {
      children.set(node.nodeId, node.childIds);
    }
  }

  const depths = new Map<string, number>();
  const queue: string[] = [];
  for (const node of nodes) {
    if (node.nodeId && !parents.has(node.nodeId)) {
      depths.set(node.nodeId, 0);
      queue.push(node.nodeId);
    }
  }
  for (let head = 0; head < queue.length; head++) {
    const current = queue[head];
    const depth = depths.get(current) ?? 0;
    for (const child of children.get(current) ?? []) {
      if (!depths.has(child)) {
        depths.set(child, depth + 1);
        queue.push(child);
      }
    }
  }
  return depths;
}

/**
 * Converts a `Accessibility.getFullAXTree` result into element records.
 * Actionable roles are always kept; other nodes need text or a bbox.
 * Indices are left at 0 for the ranker to assign.
 */
export function parseAccessibilityTree(result: unknown, limit: number): AXParseResult {
  const stats: AXParseStats = { processed: 0, skipped: 0, actionable: 0, noBbox: 0, noText: 0 };
  const raw = z.object({ nodes: z.array(z.unknown()) }).safeParse(result);
  if (!raw.success) {
    return { elements: [], stats };
  }

  const nodes: AXNode[] = [];
  for (const candidate of raw.data.nodes) {
    const parsed = AXNodeSchema.safeParse(candidate);
    if (parsed.success) {
      nodes.push(parsed.data);
    }
  }

  const parents = new Map<string, string>();
  for (const node of nodes) {
    if (!node.nodeId) continue;
    for (const child of node.childIds ?? []) {
      parents.set(child, node.nodeId);
    }
  }
  const depths = computeDepths(nodes, parents);

  const elements: ElementRecord[] = [];
  for (const node of nodes) {
    if (elements.length >= limit) {
      break;
    }
    stats.processed++;

    const role = roleOf(node);
    if (role === '' || IGNORED_AX_ROLES.has(role.toLowerCase())) {
      stats.skipped++;
      continue;
    }
    const actionable = ACTIONABLE_ROLES.has(role);
    if (actionable) {
      stats.actionable++;
    }

    const name = valueString(node.name);
    const value = valueString(node.value);
    const text = (name || value).slice(0, TEXT_LIMIT);
    const bbox = bboxOf(node);
    if (bbox === '') stats.noBbox++;
    if (text === '') stats.noText++;

    if (!actionable && text === '' && bbox === '') {
      stats.skipped++;
      continue;
    }

    const attr: string[] = [];
    if (name) attr.push(`name:${name}`);
    if (value) attr.push(`value:${value}`);

    elements.push(
      ElementRecord.create({
        role,
        text,
        attr: attr.join('|'),
        bbox,
        selector: axSelector(role, name, role === 'textbox' ? inputTypeOf(node) : undefined),
        depth: node.nodeId ? depths.get(node.nodeId) ?? 0 : 0,
        nodeId: node.nodeId,
        parentId: node.nodeId ? parents.get(node.nodeId) : undefined,
      })
    );
  }

  return { elements, stats };
}
