/*
 * Faults raised by replica mutations.
 *
 * These mean the server and the replica disagree about something the replica
 * cannot recover from locally, e.g. a seat number out of range.  They are
 * thrown, and caught only at the dispatcher's boundary.
 */

export namespace Replica {
  export class Error extends globalThis.Error {
    constructor(readonly msg?: string) {
      super(msg);
      this.name = new.target.name;
    }
    toString(): string { return `${this.name}: ${this.msg}`; }
  }
  export class BadSeatError extends Error {}
  export class NoPlayerError extends Error {}
}
