import type { UrdfParseContext } from "./context";
import { FAILED, ok, type ElementResult } from "./diagnostics";
import type { CollisionFilterGroupSpec } from "./urdfModel";
import { childElements, readBooleanAttribute, readName } from "./xml";

/** Link names of a filtered pair, sorted. */
export type CollisionFilterPair = [string, string];

export type UnknownIgnoredGroup = { group: string; ignored: string };

function missingRequired(tag: string, attribute: string) {
  return `The tag <${tag}> does not specify the required attribute "${attribute}".`;
}

/**
 * `<V:collision_filter_group name self_ignore>`. Broken members and ignore
 * entries are reported and dropped; the group itself survives them.
 */
export function parseCollisionFilterGroup(ctx: UrdfParseContext, el: Element): ElementResult<CollisionFilterGroupSpec> {
  const sink = ctx.diagnostics;
  const { tags } = ctx;
  const name = readName(el, "name");
  if (!name) return sink.fail(el, missingRequired(tags.collisionFilterGroup, "name"));

  const selfIgnore = readBooleanAttribute(sink, el, "self_ignore", true);
  if (selfIgnore === null) return FAILED;

  const members: string[] = [];
  for (const memberEl of childElements(el, tags.member)) {
    const link = readName(memberEl, "link");
    if (!link) {
      sink.error(memberEl, missingRequired(tags.member, "link"));
      continue;
    }
    if (ctx.names.resolveLink(link) === undefined) {
      sink.error(memberEl, `Collision filter group '${name}' names link '${link}' which does not exist.`);
      continue;
    }
    if (!members.includes(link)) members.push(link);
  }

  const ignoredGroups: string[] = [];
  for (const ignoredEl of childElements(el, tags.ignoredCollisionFilterGroup)) {
    const ignored = readName(ignoredEl, "name");
    if (!ignored) {
      sink.error(ignoredEl, missingRequired(tags.ignoredCollisionFilterGroup, "name"));
      continue;
    }
    if (!ignoredGroups.includes(ignored)) ignoredGroups.push(ignored);
  }

  return ok({ name, members, ignoredGroups, selfIgnore });
}

export function findUnknownIgnoredGroups(groups: readonly CollisionFilterGroupSpec[]): UnknownIgnoredGroup[] {
  const known = new Set(groups.map((group) => group.name));
  return groups.flatMap((group) =>
    group.ignoredGroups.filter((ignored) => !known.has(ignored)).map((ignored) => ({ group: group.name, ignored }))
  );
}

/**
 * Every unordered pair of distinct member links whose collisions are
 * filtered: one link's group lists a group of the other, or both share a
 * self-ignoring group. Rules only ever add pairs. Output is sorted.
 */
export function resolveCollisionFilterPairs(groups: readonly CollisionFilterGroupSpec[]): CollisionFilterPair[] {
  const byName = new Map<string, CollisionFilterGroupSpec>(groups.map((group) => [group.name, group]));
  const groupsOfLink = new Map<string, string[]>();
  for (const group of groups) {
    for (const link of group.members) {
      const list = groupsOfLink.get(link) ?? [];
      if (!list.includes(group.name)) list.push(group.name);
      groupsOfLink.set(link, list);
    }
  }

  const ignores = (from: string, to: string) => byName.get(from)?.ignoredGroups.includes(to) ?? false;
  const filtered = (a: string, b: string) => {
    const groupsA = groupsOfLink.get(a) ?? [];
    const groupsB = groupsOfLink.get(b) ?? [];
    for (const ga of groupsA) {
      for (const gb of groupsB) {
        if (ignores(ga, gb) || ignores(gb, ga)) return true;
        if (ga === gb && byName.get(ga)?.selfIgnore) return true;
      }
    }
    return false;
  };

  const links = Array.from(groupsOfLink.keys()).sort();
  const pairs: CollisionFilterPair[] = [];
  for (let i = 0; i < links.length; i += 1) {
    for (let j = i + 1; j < links.length; j += 1) {
      if (filtered(links[i], links[j])) pairs.push([links[i], links[j]]);
    }
  }
  return pairs;
}
