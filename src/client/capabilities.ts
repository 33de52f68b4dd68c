/*
 * What a server connection can do, derived from the version and feature set
 * it reports.
 *
 * Every version comparison the handlers need lives here; handlers ask a
 * question rather than comparing version numbers themselves.
 */

import { DEV_CARD_VERSION_FOR_NEW_TYPES } from '../lib/game/constants'
import { VERSION_FOR_LONGER_OPTNAMES } from '../lib/game/game-options'

import * as options from '../options'

export const VERSION_FOR_NEWGAMEWITHOPTIONS = 1107;
export const VERSION_FOR_SERVERFEATURES = 1119;
export const VERSION_FOR_I18N = 2000;
export const VERSION_FOR_DEBUG_STATUS_VALUE = 2000;

/*
 * A server's optional features, wire-encoded as `;feat;feat=val;`.
 */
export class FeatureSet {
  private feats = new Map<string, number | null>();

  constructor(encoded: string) {
    for (const tok of encoded.split(';')) {
      if (tok === '') continue;
      const eq = tok.indexOf('=');
      if (eq < 0) {
        this.feats.set(tok, null);
      } else {
        const val = parseInt(tok.slice(eq + 1), 10);
        this.feats.set(tok.slice(0, eq), isNaN(val) ? null : val);
      }
    }
  }

  /*
   * what servers that predate feature reporting all support: accounts, chat
   * channels, and open registration
   */
  static legacy(): FeatureSet {
    return new FeatureSet(';accts;ch;oreg;');
  }

  has(feat: string): boolean {
    return this.feats.has(feat);
  }

  /*
   * an int-valued feature, or `dflt` if it's absent or has no value
   */
  value(feat: string, dflt: number): number {
    return this.feats.get(feat) ?? dflt;
  }

  toString(): string {
    if (this.feats.size === 0) return '';
    const toks = [...this.feats].map(([f, v]) => v === null ? f : `${f}=${v}`);
    return `;${toks.join(';')};`;
  }
}

export class ServerCapabilities {
  constructor(
    readonly version: number,
    readonly feats: FeatureSet,
    readonly is_practice: boolean,
  ) {}

  /*
   * the in-process server always runs our own version
   */
  static practice(): ServerCapabilities {
    return new ServerCapabilities(options.client_version, FeatureSet.legacy(), true);
  }

  /*
   * a remote server we haven't heard a version from yet
   */
  static unknown(): ServerCapabilities {
    return new ServerCapabilities(0, new FeatureSet(''), false);
  }

  /*
   * build from a VERSION report; servers too old to report features get
   * the legacy set
   */
  static from_report(version: number, feats: string): ServerCapabilities {
    const fs = version < VERSION_FOR_SERVERFEATURES
      ? FeatureSet.legacy()
      : new FeatureSet(feats);
    return new ServerCapabilities(version, fs, false);
  }

  supports_options(): boolean {
    return this.version >= VERSION_FOR_NEWGAMEWITHOPTIONS;
  }

  supports_long_option_names(): boolean {
    return this.version >= VERSION_FOR_LONGER_OPTNAMES;
  }

  supports_i18n(): boolean {
    return this.is_practice || this.version >= VERSION_FOR_I18N;
  }

  /*
   * whether dev card codes on this connection use the old numbering, with
   * knight and unknown swapped
   */
  uses_legacy_dev_card_codes(): boolean {
    return !this.is_practice && this.version < DEV_CARD_VERSION_FOR_NEW_TYPES;
  }

  /*
   * whether debug mode arrives as a status value; older servers only say
   * "debug" in the status text
   */
  reports_debug_via_status_value(): boolean {
    return this.is_practice || this.version >= VERSION_FOR_DEBUG_STATUS_VALUE;
  }
}
