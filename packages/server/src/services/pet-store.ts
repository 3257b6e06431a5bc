/**
 * In-memory pet store.
 *
 * Backs the reference API. Ids are assigned sequentially from 1.
 */

// =============================================================================
// Types
// =============================================================================

export interface Pet {
  readonly id: number;
  readonly name: string;
  readonly tag?: string | undefined;
}

export interface NewPet {
  readonly name: string;
  readonly tag?: string | undefined;
}

export type PetStoreErrorCode = "PET_NOT_FOUND" | "PET_EXISTS";

export class PetStoreError extends Error {
  public readonly code: PetStoreErrorCode;

  constructor(code: PetStoreErrorCode, message: string) {
    super(message);
    this.name = "PetStoreError";
    this.code = code;
  }
}

// =============================================================================
// Store
// =============================================================================

export class PetStore {
  private readonly pets = new Map<number, Pet>();
  private nextId = 1;

  /**
   * Add a pet. Names are unique, compared case-insensitively.
   *
   * @throws {PetStoreError} PET_EXISTS if the name is taken
   */
  create(pet: NewPet): Pet {
    const name = pet.name.trim();
    for (const existing of this.pets.values()) {
      if (existing.name.toLowerCase() === name.toLowerCase()) {
        throw new PetStoreError("PET_EXISTS", `Pet '${name}' already exists`);
      }
    }

    const created: Pet =
      pet.tag === undefined
        ? { id: this.nextId, name }
        : { id: this.nextId, name, tag: pet.tag };
    this.pets.set(created.id, created);
    this.nextId += 1;
    return created;
  }

  /** @throws {PetStoreError} PET_NOT_FOUND */
  get(id: number): Pet {
    const pet = this.pets.get(id);
    if (pet === undefined) {
      throw new PetStoreError("PET_NOT_FOUND", `Pet ${id} not found`);
    }
    return pet;
  }

  /** Pets in id order, at most `limit` of them. */
  list(limit?: number): readonly Pet[] {
    const all = [...this.pets.values()].sort((a, b) => a.id - b.id);
    return limit === undefined ? all : all.slice(0, limit);
  }

  /** @throws {PetStoreError} PET_NOT_FOUND */
  delete(id: number): void {
    if (!this.pets.delete(id)) {
      throw new PetStoreError("PET_NOT_FOUND", `Pet ${id} not found`);
    }
  }

  size(): number {
    return this.pets.size;
  }
}
