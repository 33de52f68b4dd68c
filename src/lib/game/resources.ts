/*
 * Resource hands.
 */

import { Resource, KNOWN_RESOURCES } from './constants'
import { array_fill, array_sum } from '../../utils/array'

/*
 * Counts of each resource type, plus an "unknown" bucket for cards this
 * client can't see.  Counts never go negative.
 */
export class ResourceSet {
  // indexed by Resource; slot 0 is unused
  private amounts: number[];

  constructor(init?: Partial<Record<Resource, number>>) {
    this.amounts = array_fill(Resource.UNKNOWN + 1, 0);
    if (init) {
      for (const [rtype, amt] of Object.entries(init)) {
        this.set(Number(rtype), amt ?? 0);
      }
    }
  }

  /*
   * build a set from a 5-tuple of clay, ore, sheep, wheat, wood
   */
  static from_known(counts: readonly number[]): ResourceSet {
    const rs = new ResourceSet();
    KNOWN_RESOURCES.forEach((r, i) => rs.set(r, counts[i] ?? 0));
    return rs;
  }

  get(rtype: Resource): number {
    return this.amounts[rtype] ?? 0;
  }

  set(rtype: Resource, amt: number) {
    if (rtype < Resource.CLAY || rtype > Resource.UNKNOWN) return;
    this.amounts[rtype] = Math.max(0, amt);
  }

  add(rtype: Resource, amt: number) {
    this.set(rtype, this.get(rtype) + amt);
  }

  add_set(other: ResourceSet) {
    for (let r: number = Resource.CLAY; r <= Resource.UNKNOWN; ++r) {
      this.add(r, other.get(r));
    }
  }

  /*
   * take `amt` of `rtype`; if we don't hold that many, the shortfall comes
   * out of the unknown bucket and `rtype` goes to zero
   */
  subtract(rtype: Resource, amt: number) {
    const held = this.get(rtype);
    if (amt > held) {
      this.add(Resource.UNKNOWN, -(amt - held));
      this.set(rtype, 0);
    } else {
      this.set(rtype, held - amt);
    }
  }

  /*
   * fold every known resource into the unknown bucket
   */
  convert_to_unknown() {
    const total = this.total();
    this.clear();
    this.set(Resource.UNKNOWN, total);
  }

  clear() {
    this.amounts.fill(0);
  }

  total(): number {
    return array_sum(this.amounts);
  }

  known_total(): number {
    return this.total() - this.get(Resource.UNKNOWN);
  }

  copy(): ResourceSet {
    const rs = new ResourceSet();
    rs.amounts = [...this.amounts];
    return rs;
  }

  equals(other: ResourceSet): boolean {
    return this.amounts.every((n, i) => n === other.amounts[i]);
  }

  toString(): string {
    return `clay=${this.get(Resource.CLAY)}|ore=${this.get(Resource.ORE)}` +
      `|sheep=${this.get(Resource.SHEEP)}|wheat=${this.get(Resource.WHEAT)}` +
      `|wood=${this.get(Resource.WOOD)}|unknown=${this.get(Resource.UNKNOWN)}`;
  }
}
