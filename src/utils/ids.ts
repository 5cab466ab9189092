/**
 * Hearth ID Generation
 *
 * Listener and job ids are per-kind monotonic integers and are never
 * reused within a process. Task ids and event context ids are nanoid
 * strings, prefixed for easy visual identification in logs.
 */

import { nanoid } from "nanoid";
import { ListenerId, JobId, TaskId } from "../types/index.js";

/** A monotonic integer sequence starting at 1. */
export class Sequence {
  private last = 0;

  next(): number {
    this.last += 1;
    return this.last;
  }

  get current(): number {
    return this.last;
  }
}

const listenerSeq = new Sequence();
const jobSeq = new Sequence();
const internalEventSeq = new Sequence();

export const nextListenerId = (): ListenerId => ListenerId(listenerSeq.next());
export const nextJobId = (): JobId => JobId(jobSeq.next());
export const nextInternalEventId = (): number => internalEventSeq.next();

export const genTaskId = (): TaskId => TaskId(`tsk_${nanoid(12)}`);
export const genContextId = (): string => `ctx_${nanoid(20)}`;
