/**
 * Accumulates records for one extraction pass.
 *
 * Bindings are routed to exactly one of the two collections by `isMutable`;
 * insertion order is kept.
 */

import type { BindingRecord, DeclarationRecord } from './BindingTypes.js';

export class BindingCollector {
  private readonly mutableBindings: BindingRecord[] = [];
  private readonly immutableBindings: BindingRecord[] = [];
  private readonly declarationRecords: DeclarationRecord[] = [];

  addBinding(record: BindingRecord): void {
    const frozen = Object.freeze({ ...record, location: Object.freeze({ ...record.location }) });
    if (frozen.isMutable) {
      this.mutableBindings.push(frozen);
    } else {
      this.immutableBindings.push(frozen);
    }
  }

  addDeclaration(record: DeclarationRecord): void {
    this.declarationRecords.push(
      Object.freeze({ ...record, location: Object.freeze({ ...record.location }) })
    );
  }

  get mutable(): readonly BindingRecord[] {
    return this.mutableBindings;
  }

  get immutable(): readonly BindingRecord[] {
    return this.immutableBindings;
  }

  get declarations(): readonly DeclarationRecord[] {
    return this.declarationRecords;
  }
}
