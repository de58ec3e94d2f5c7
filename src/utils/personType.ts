import type { Person, PersonKind } from '../types/observation';
import { ValidationError } from './errors';

export const PERSON = 1;
export const PATIENT = 2;
export const USER = 4;

const KIND_BITS: Record<PersonKind, number> = {
  PERSON,
  PATIENT,
  USER
};

const PERSON_KINDS: PersonKind[] = ['PERSON', 'PATIENT', 'USER'];

const ALL_BITS = PERSON | PATIENT | USER;

/**
 * Combinable subject-kind filter over {PERSON, PATIENT, USER}.
 *
 * The empty mask matches every subject. Every subject carries the PERSON bit;
 * patients and users additionally carry their own bit, so a PATIENT|USER mask
 * leaves out subjects that are plain persons.
 */
export class PersonTypeMask {
  static readonly ANY = new PersonTypeMask(0);

  private constructor(readonly bits: number) {}

  static of(...kinds: PersonKind[]): PersonTypeMask {
    return new PersonTypeMask(kinds.reduce((acc, kind) => acc | KIND_BITS[kind], 0));
  }

  static fromBits(bits: number | null | undefined): PersonTypeMask {
    if (bits === null || bits === undefined || bits === 0) {
      return PersonTypeMask.ANY;
    }
    if (!Number.isInteger(bits) || bits < 0 || (bits & ~ALL_BITS) !== 0) {
      throw new ValidationError(`Invalid person type mask: ${bits}`, [
        { field: 'personType', message: `must be an integer between 0 and ${ALL_BITS}` }
      ]);
    }
    return new PersonTypeMask(bits);
  }

  get isAny(): boolean {
    return this.bits === 0;
  }

  has(kind: PersonKind): boolean {
    return (this.bits & KIND_BITS[kind]) !== 0;
  }

  kinds(): PersonKind[] {
    return PERSON_KINDS.filter((kind) => this.has(kind));
  }

  matches(person: Pick<Person, 'kind'>): boolean {
    return this.isAny || (this.bits & subjectBits(person.kind)) !== 0;
  }
}

export const subjectBits = (kind: PersonKind): number => PERSON | KIND_BITS[kind];
