import type { ClusterConfig } from '../../../packages/common/src/config'
import { resolveBoroughParameter } from '../../../packages/crash-store/src/predicate'
import { SHARD_ORDER } from '../../../packages/proto/src/types'
import type { Borough } from '../../../packages/proto/src/types'

export interface WorkerRoute {
  workerId: string
  address: string
}

/**
 * One dispatch: the shards of one worker a query needs scanned.
 */
export interface DispatchTarget extends WorkerRoute {
  shards: Borough[]
}

/**
 * Static shard -> worker map, built once at startup.
 */
export class RoutingTable {
  private readonly owners: ReadonlyMap<Borough, WorkerRoute>
  private readonly routes: ReadonlyMap<string, WorkerRoute>

  public constructor(owners: Iterable<[Borough, WorkerRoute]>) {
    this.owners = new Map(owners)
    const routes = new Map<string, WorkerRoute>()
    for (const route of this.owners.values()) {
      routes.set(route.workerId, route)
    }
    this.routes = routes
  }

  public static fromConfig(config: ClusterConfig): RoutingTable {
    const owners: [Borough, WorkerRoute][] = []
    for (const worker of config.workers) {
      for (const shard of worker.shards) {
        owners.push([shard.borough, { workerId: worker.id, address: worker.address }])
      }
    }
    return new RoutingTable(owners)
  }

  public ownerOf(borough: Borough): WorkerRoute | null {
    return this.owners.get(borough) ?? null
  }

  public worker(workerId: string): WorkerRoute | null {
    return this.routes.get(workerId) ?? null
  }

  public workers(): WorkerRoute[] {
    return [...this.routes.values()]
  }

  /**
   * Shards a query must reach. `get_by_borough` targets the one shard owning
   * the borough, or none when the name is not recognized; every other verb
   * targets all shards.
   */
  public resolveShards(queryString: string, parameters: readonly string[]): Borough[] {
    if (queryString === 'get_by_borough' && parameters.length === 1) {
      const borough = resolveBoroughParameter(parameters[0])
      return borough == null ? [] : [borough]
    }
    return SHARD_ORDER.filter((borough) => this.owners.has(borough))
  }

  /**
   * Groups the shards a query must reach by owning worker, one target per
   * worker, ordered by each worker's first shard.
   */
  public resolveTargets(queryString: string, parameters: readonly string[]): DispatchTarget[] {
    const targets = new Map<string, DispatchTarget>()
    for (const borough of this.resolveShards(queryString, parameters)) {
      const owner = this.owners.get(borough)
      if (owner == null) {
        continue
      }
      const target = targets.get(owner.workerId)
      if (target) {
        target.shards.push(borough)
      } else {
        targets.set(owner.workerId, { ...owner, shards: [borough] })
      }
    }
    return [...targets.values()]
  }
}
