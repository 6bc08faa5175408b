/**
 * Repository interface for the persistence store.
 */

/**
 * Generic repository operations.
 */
export interface Repository<T extends { id: string }> {
  /** Save (insert or update) an entity */
  save(entity: T): Promise<T>;

  /** Get an entity by ID */
  get(id: string): Promise<T | null>;

  /** Get all entities */
  getAll(): Promise<T[]>;

  /** Delete an entity by ID */
  delete(id: string): Promise<boolean>;

  /** Check if an entity exists */
  exists(id: string): Promise<boolean>;

  /** Find entities matching a predicate */
  find(predicate: (entity: T) => boolean): Promise<T[]>;

  /** Count all entities */
  count(): Promise<number>;
}

/**
 * Extended repository with indexed lookups.
 * Only properties declared in the repository's field mappings can be queried.
 */
export interface IndexedRepository<T extends { id: string }> extends Repository<T> {
  /** Find one entity by a unique indexed field */
  findByIndex<K extends keyof T>(field: K, value: T[K]): Promise<T | null>;

  /** Find all entities matching an indexed field */
  findAllByIndex<K extends keyof T>(field: K, value: T[K]): Promise<T[]>;

  /** Count entities matching an indexed field */
  countByIndex<K extends keyof T>(field: K, value: T[K]): Promise<number>;
}
