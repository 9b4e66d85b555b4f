import { v4 as uuidv4 } from 'uuid';
import type { ProviderSnapshot } from '../types/subscription';

/**
 * Service provider (Netflix, Adobe, ...). Shared between subscriptions and
 * persisted on its own; a subscription only references it.
 */
export class Provider {
  readonly id: string;
  readonly name: string;
  readonly category: string;
  readonly website: string | null;

  constructor(id: string, name: string, category: string, website: string | null = null) {
    this.id = id;
    this.name = name;
    this.category = category;
    this.website = website;
    Object.freeze(this);
  }

  static create(name: string, category: string, website?: string): Provider {
    return new Provider(uuidv4(), name, category, website ?? null);
  }

  static fromSnapshot(snapshot: ProviderSnapshot): Provider {
    return new Provider(snapshot.id, snapshot.name, snapshot.category, snapshot.website);
  }

  equals(other: Provider): boolean {
    return this.id === other.id;
  }

  toJSON(): ProviderSnapshot {
    return {
      id: this.id,
      name: this.name,
      category: this.category,
      website: this.website,
    };
  }
}
