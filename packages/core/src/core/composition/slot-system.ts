import type { CompositionFragment } from '../../types/index.js';
import { SLOTS } from '../../constants/index.js';
import type { PositionedFragment } from './types.js';

interface SlotEntry {
  fragment: CompositionFragment;
  position: number;
  sequence: number;
}

/**
 * Named insertion points for the merge strategy.
 *
 * Fragments register against a slot name; reading a slot returns them
 * ordered by ascending priority, then by chain position (root first), then
 * by registration order. One instance is used per output file.
 */
export class SlotSystem {
  private slots = new Map<string, SlotEntry[]>();
  private sequence = 0;

  register(slotName: string, fragment: CompositionFragment, position: number): void {
    const entries = this.slots.get(slotName) ?? [];
    entries.push({ fragment, position, sequence: this.sequence++ });
    this.slots.set(slotName, entries);
  }

  has(slotName: string): boolean {
    return this.slots.has(slotName);
  }

  /** Slot names in first-registration order */
  slotNames(): string[] {
    return Array.from(this.slots.keys());
  }

  getSlotContent(slotName: string): CompositionFragment[] {
    const entries = this.slots.get(slotName) ?? [];
    return [...entries]
      .sort((a, b) =>
        a.fragment.priority - b.fragment.priority ||
        a.position - b.position ||
        a.sequence - b.sequence
      )
      .map(entry => entry.fragment);
  }

  render(
    slotName: string,
    separator: string = SLOTS.SEPARATOR,
    contentOf: (fragment: CompositionFragment) => string = fragment => fragment.content
  ): string {
    return this.getSlotContent(slotName).map(contentOf).join(separator);
  }

  clear(): void {
    this.slots.clear();
    this.sequence = 0;
  }
}

/** Slot names referenced by markers in the content, first occurrence order. */
export function findSlotMarkers(content: string): string[] {
  const names: string[] = [];
  for (const match of content.matchAll(new RegExp(SLOTS.MARKER_SOURCE, 'g'))) {
    if (!names.includes(match[1])) names.push(match[1]);
  }
  return names;
}

export function hasSlotMarkers(content: string): boolean {
  return new RegExp(SLOTS.MARKER_SOURCE).test(content);
}

export interface SlotMergeResult {
  content: string;
  /** templateIds whose content reached the output, first appearance order */
  contributors: string[];
  warnings: string[];
}

/**
 * Merge every fragment for one path.
 *
 * The root-most fragment containing slot markers hosts the others: each
 * marker is replaced by its slot's content (empty when nothing fills it).
 * Markers inside placed content are expanded the same way, so a middle
 * template can open slots for its descendants; a slot's marker inside its
 * own content is dropped. Content for a slot no marker references is
 * appended at the end. Without a host, the default slot comes first,
 * followed by each named slot in the order it was first filled.
 */
export function mergeWithSlots(
  filePath: string,
  entries: readonly PositionedFragment[],
  separator: string = SLOTS.SEPARATOR
): SlotMergeResult {
  const ordered = [...entries].sort((a, b) => a.position - b.position);
  const host = ordered.find(entry => hasSlotMarkers(entry.fragment.content));
  const slots = new SlotSystem();
  const warnings: string[] = [];
  const used = new Set<string>();

  for (const entry of ordered) {
    if (entry === host) continue;
    slots.register(entry.fragment.slot ?? SLOTS.DEFAULT, entry.fragment, entry.position);
  }

  const warn = (message: string): void => {
    if (!warnings.includes(message)) warnings.push(message);
  };

  // `open` holds the slots being rendered around this content
  const expand = (content: string, open: readonly string[]): string =>
    content.replace(new RegExp(SLOTS.MARKER_SOURCE, 'g'), (_marker, name: string) => {
      if (open.includes(name)) {
        warn(`Slot '${name}' in '${filePath}' contains its own marker; the nested marker was dropped`);
        return '';
      }
      used.add(name);
      return renderSlot(name, [...open, name]);
    });

  const renderSlot = (name: string, open: readonly string[]): string =>
    slots.render(name, separator, fragment => expand(fragment.content, open));

  const pieces: string[] = [];

  if (host) {
    pieces.push(expand(host.fragment.content, []));

    for (const name of slots.slotNames()) {
      if (used.has(name)) continue;
      if (name !== SLOTS.DEFAULT) {
        warn(`Slot '${name}' has no marker in '${filePath}' (host '${host.fragment.templateId}'); content appended at the end`);
      }
      used.add(name);
      pieces.push(renderSlot(name, [name]));
    }
  } else {
    if (slots.has(SLOTS.DEFAULT)) {
      used.add(SLOTS.DEFAULT);
      pieces.push(renderSlot(SLOTS.DEFAULT, [SLOTS.DEFAULT]));
    }
    for (const name of slots.slotNames()) {
      if (used.has(name)) continue;
      warn(`Slot '${name}' in '${filePath}' has no host marker; content appended at the end`);
      used.add(name);
      pieces.push(renderSlot(name, [name]));
    }
  }

  const contributors: string[] = [];
  for (const entry of ordered) {
    if (!contributors.includes(entry.fragment.templateId)) {
      contributors.push(entry.fragment.templateId);
    }
  }

  return { content: pieces.join(separator), contributors, warnings };
}
