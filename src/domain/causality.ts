import { compareTimestamps } from './event.js';
import type { SimulationEvent } from './event.js';

/**
 * Forward and reverse adjacency over `caused_by` references.
 *
 * `events` maps id → event (first occurrence wins, matching lookup by id).
 * `children` maps parent id → events that list it in `caused_by`.
 */
export interface CausalityIndex {
  readonly events: ReadonlyMap<string, SimulationEvent>;
  readonly children: ReadonlyMap<string, readonly SimulationEvent[]>;
}

export function buildCausalityIndex(events: Iterable<SimulationEvent>): CausalityIndex {
  const lookup = new Map<string, SimulationEvent>();
  const children = new Map<string, SimulationEvent[]>();

  for (const event of events) {
    if (lookup.has(event.event_id)) continue;
    lookup.set(event.event_id, event);

    for (const parentId of new Set(event.caused_by)) {
      let list = children.get(parentId);
      if (list === undefined) {
        list = [];
        children.set(parentId, list);
      }
      list.push(event);
    }
  }

  return { events: lookup, children };
}

/**
 * Ancestors of `eventId` reachable within `depth` hops.
 *
 * Pre-order walk over `caused_by` (first parent's lineage before the second
 * parent) using an explicit stack. A visited set guards against cycles;
 * each ancestor appears once and the target itself is never included.
 * Parents absent from the index are skipped.
 */
export function collectUpstream(
  index: CausalityIndex,
  eventId: string,
  depth: number,
): SimulationEvent[] {
  const upstream: SimulationEvent[] = [];
  const collected = new Set<string>([eventId]);
  const expanded = new Set<string>();
  const stack: Array<{ id: string; hops: number }> = [];

  const expand = (id: string, hops: number): void => {
    if (hops >= depth || expanded.has(id)) return;
    expanded.add(id);
    const parents = index.events.get(id)?.caused_by ?? [];
    for (const parentId of [...parents].reverse()) {
      stack.push({ id: parentId, hops: hops + 1 });
    }
  };

  expand(eventId, 0);

  let frame = stack.pop();
  while (frame !== undefined) {
    const parent = index.events.get(frame.id);
    if (parent !== undefined && !collected.has(frame.id)) {
      collected.add(frame.id);
      upstream.push(parent);
      expand(frame.id, frame.hops);
    }
    frame = stack.pop();
  }

  return upstream;
}

/** Events that directly reference `eventId`. One hop only. */
export function collectDownstream(index: CausalityIndex, eventId: string): SimulationEvent[] {
  return [...(index.children.get(eventId) ?? [])];
}

// ─── Integrity ───────────────────────────────────────────────

export interface MissingParent {
  readonly event_id: string;
  readonly parent_id: string;
}

export interface TemporalViolation {
  readonly event_id: string;
  readonly parent_id: string;
  readonly event_timestamp: string;
  readonly parent_timestamp: string;
}

export interface CausalityReport {
  readonly checked: number;
  readonly missing_parents: readonly MissingParent[];
  readonly temporal_violations: readonly TemporalViolation[];
  /** Ids of events that lie on at least one causal cycle. */
  readonly cyclic_events: readonly string[];
  readonly valid: boolean;
}

/**
 * Checks the producer contract for `caused_by`: every parent exists,
 * no parent is timestamped after its child, and the graph has no cycles.
 */
export function verifyCausality(index: CausalityIndex): CausalityReport {
  const missing: MissingParent[] = [];
  const temporal: TemporalViolation[] = [];

  for (const event of index.events.values()) {
    for (const parentId of event.caused_by) {
      const parent = index.events.get(parentId);
      if (parent === undefined) {
        missing.push({ event_id: event.event_id, parent_id: parentId });
        continue;
      }
      if (compareTimestamps(parent.timestamp, event.timestamp) > 0) {
        temporal.push({
          event_id: event.event_id,
          parent_id: parentId,
          event_timestamp: event.timestamp,
          parent_timestamp: parent.timestamp,
        });
      }
    }
  }

  const cyclic = findCyclicEvents(index);

  return {
    checked: index.events.size,
    missing_parents: missing,
    temporal_violations: temporal,
    cyclic_events: cyclic,
    valid: missing.length === 0 && temporal.length === 0 && cyclic.length === 0,
  };
}

/**
 * Iterative Tarjan SCC over parent edges. An event is cyclic when its
 * component has more than one member or it lists itself as a parent.
 */
function findCyclicEvents(index: CausalityIndex): string[] {
  const order = new Map<string, number>();
  const low = new Map<string, number>();
  const onStack = new Set<string>();
  const sccStack: string[] = [];
  const cyclic: string[] = [];
  let counter = 0;

  const parentsOf = (id: string): string[] =>
    (index.events.get(id)?.caused_by ?? []).filter((p) => index.events.has(p));

  for (const root of index.events.keys()) {
    if (order.has(root)) continue;

    const work: Array<{ id: string; next: number }> = [{ id: root, next: 0 }];
    order.set(root, counter);
    low.set(root, counter);
    counter++;
    sccStack.push(root);
    onStack.add(root);

    while (work.length > 0) {
      const top = work[work.length - 1];
      if (top === undefined) break;
      const parents = parentsOf(top.id);

      if (top.next < parents.length) {
        const parentId = parents[top.next];
        top.next++;
        if (parentId === undefined) continue;

        if (!order.has(parentId)) {
          order.set(parentId, counter);
          low.set(parentId, counter);
          counter++;
          sccStack.push(parentId);
          onStack.add(parentId);
          work.push({ id: parentId, next: 0 });
        } else if (onStack.has(parentId)) {
          low.set(top.id, Math.min(low.get(top.id) ?? 0, order.get(parentId) ?? 0));
        }
        continue;
      }

      work.pop();
      const caller = work[work.length - 1];
      if (caller !== undefined) {
        low.set(caller.id, Math.min(low.get(caller.id) ?? 0, low.get(top.id) ?? 0));
      }

      if (low.get(top.id) === order.get(top.id)) {
        const component: string[] = [];
        let member: string | undefined;
        do {
          member = sccStack.pop();
          if (member === undefined) break;
          onStack.delete(member);
          component.push(member);
        } while (member !== top.id);

        const selfLoop = parents.includes(top.id);
        if (component.length > 1 || selfLoop) {
          cyclic.push(...component);
        }
      }
    }
  }

  return cyclic;
}
