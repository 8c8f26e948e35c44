/**
 * Cluster-wide health flag and error set
 * @module @strata/core/services/cluster-context
 */

import { shallowReactive } from '@vue/reactivity';

/**
 * Conditions that mark the cluster as degraded
 */
export type ClusterErrorCode = 'INVALID_NETWORK_TOPOLOGY' | 'NODE_TABLE_LOAD_FAILED';

export class ClusterContext {
  private readonly state = shallowReactive({
    healthy: true,
    errors: new Set<ClusterErrorCode>(),
  });

  constructor(private readonly clusterId: string) {}

  getClusterId(): string {
    return this.clusterId;
  }

  updateHealthStatus(healthy: boolean): void {
    this.state.healthy = healthy;
  }

  isHealthy(): boolean {
    return this.state.healthy;
  }

  addError(code: ClusterErrorCode): void {
    this.state.errors = new Set([...this.state.errors, code]);
  }

  removeError(code: ClusterErrorCode): void {
    if (!this.state.errors.has(code)) return;
    const next = new Set(this.state.errors);
    next.delete(code);
    this.state.errors = next;
  }

  hasError(code: ClusterErrorCode): boolean {
    return this.state.errors.has(code);
  }

  getErrors(): ClusterErrorCode[] {
    return [...this.state.errors].sort();
  }
}
