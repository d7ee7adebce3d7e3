import { ConfigurationError } from "../errors.js";
import {
  initFromRecord,
  type Relationship,
  type RelationshipInit,
  relationshipRecordSchema,
  SimpleRelationship,
} from "./relationship.js";

export type RelationshipConstructor = (init: RelationshipInit) => Relationship;

/** Maps relationship type names to the class that implements them. */
export class RelationshipTypeRegistry {
  private readonly constructors = new Map<string, RelationshipConstructor>();

  constructor(private readonly fallback: RelationshipConstructor = (init) => new SimpleRelationship(init)) {}

  register(type: string, ctor: RelationshipConstructor): this {
    if (this.constructors.has(type)) {
      throw new ConfigurationError(`Relationship type "${type}" is already registered`);
    }
    this.constructors.set(type, ctor);
    return this;
  }

  has(type: string): boolean {
    return this.constructors.has(type);
  }

  types(): string[] {
    return [...this.constructors.keys()];
  }

  create(init: RelationshipInit): Relationship {
    const ctor = this.constructors.get(init.type) ?? this.fallback;
    return ctor(init);
  }

  fromRecord(raw: unknown): Relationship {
    const parsed = relationshipRecordSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ConfigurationError(
        `Invalid relationship record at ${issue?.path.join(".") ?? "?"}: ${issue?.message ?? "unknown"}`,
      );
    }
    return this.create(initFromRecord(parsed.data));
  }
}
