import { WORLD_BODY, WORLD_FRAME } from "../model/types";
import type { ActuatorIndex, BodyIndex, FrameIndex, JointIndex } from "../model/types";
import type { CollisionFilterGroupSpec, JointSpec, MaterialSpec } from "./urdfModel";

export const WORLD_LINK = "world";

export type CommittedJoint = { index: JointIndex; spec: JointSpec };

export type CommittedGroup = { spec: CollisionFilterGroupSpec; element: Element };

/** One namespace of unique names. Insertion order is kept. */
export class NameTable<T> {
  private entries = new Map<string, T>();
  readonly label: string;

  constructor(label: string) {
    this.label = label;
  }

  has(name: string) {
    return this.entries.has(name);
  }

  get(name: string): T | undefined {
    return this.entries.get(name);
  }

  /** Returns false, leaving the existing entry alone, when `name` is taken. */
  claim(name: string, value: T): boolean {
    if (this.entries.has(name)) return false;
    this.entries.set(name, value);
    return true;
  }

  values() {
    return Array.from(this.entries.values());
  }

  get size() {
    return this.entries.size;
  }
}

/** Everything committed so far in one parse call, by name. */
export class NameIndex {
  readonly links = new NameTable<BodyIndex>("link");
  readonly linkFrames = new NameTable<FrameIndex>("link frame");
  readonly frames = new NameTable<FrameIndex>("frame");
  readonly joints = new NameTable<CommittedJoint>("joint");
  readonly materials = new NameTable<MaterialSpec>("material");
  readonly actuators = new NameTable<ActuatorIndex>("actuator");
  readonly groups = new NameTable<CommittedGroup>("collision filter group");

  resolveLink(name: string): BodyIndex | undefined {
    if (name === WORLD_LINK) return WORLD_BODY;
    return this.links.get(name);
  }

  /** Explicit `<frame>` names first, then the body frames of committed links. */
  resolveFrame(name: string): FrameIndex | undefined {
    const frame = this.frames.get(name) ?? this.linkFrames.get(name);
    if (frame !== undefined) return frame;
    return name === WORLD_LINK ? WORLD_FRAME : undefined;
  }
}
