/**
 * Typed event bus for membership events
 * @module @strata/core/services/event-bus
 */

import { EventEmitter } from 'node:events';
import type {
  CommandForDatanode,
  DatanodeDetails,
  NodeHealthState,
  PipelineReport,
} from '@strata/shared';

/**
 * Payload of each membership event
 */
export interface NodeEventMap {
  /** Inbound command addressed to a datanode */
  'datanode:command': CommandForDatanode;
  'datanode:registered': { datanodeId: string; details: DatanodeDetails; newNode: boolean };
  'datanode:health-changed': { datanodeId: string; previous: NodeHealthState; current: NodeHealthState };
  'datanode:removed': { datanodeId: string };
  'datanode:pipeline-report': { datanodeId: string; report: PipelineReport };
}

export type NodeEventType = keyof NodeEventMap;

export type NodeEventListener<K extends NodeEventType> = (payload: NodeEventMap[K]) => void;

/**
 * In-process publish/subscribe over EventEmitter.
 * Listeners run synchronously in subscription order.
 */
export class NodeEventBus extends EventEmitter {
  publish<K extends NodeEventType>(type: K, payload: NodeEventMap[K]): void {
    this.emit(type, payload);
  }

  /**
   * Subscribe to one event type. Returns the unsubscribe function.
   */
  subscribe<K extends NodeEventType>(type: K, listener: NodeEventListener<K>): () => void {
    this.on(type, listener);
    return () => {
      this.off(type, listener);
    };
  }
}

/**
 * Create a new event bus
 */
export function createNodeEventBus(): NodeEventBus {
  return new NodeEventBus();
}
