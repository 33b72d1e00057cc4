/**
 * Capability set every repository exposes to a Unit of Work scope.
 *
 * Matching rules for `get` belong to the implementation.
 */
export interface Repository<TEntity, TKey> {
  /**
   * Add a new entity
   */
  add(entity: TEntity): Promise<void>;

  /**
   * Get an entity by its identity
   * @returns Entity or null if not found
   */
  get(key: TKey): Promise<TEntity | null>;

  /**
   * List every entity
   */
  list(): Promise<TEntity[]>;
}

/**
 * A repository that tracks the entities it has handed out and writes their
 * changes back on `flush()`. SQL units of work flush before committing.
 */
export interface TrackingRepository<TEntity, TKey> extends Repository<TEntity, TKey> {
  flush(): Promise<void>;
}
