/*
 * Message builders for the requests the client sends on its own.
 *
 * Everything else the client sends comes from the UI, which is not our
 * business here.
 */

import { EMPTYSTR, MsgType, NONE, sep, sep2 } from './wire'

/*
 * asks for localized option descriptions along with the option infos
 */
export const OPTKEY_GET_I18N_DESCS = '?I18N';

/*
 * asks for every scenario changed since the client's version
 */
export const MARKER_ANY_CHANGED = '?';

const line = (type: MsgType, ...fields: (string | number)[]): string =>
  `${type}${sep}${fields.map(f => f === '' ? EMPTYSTR : f).join(sep2)}`;

/*
 * ask the server about options: the named `keys`, or (for null) any it knows
 * that we don't.  `i18n_only` asks just for localized descriptions, and is
 * only meaningful with `i18n` and no keys.
 */
export function game_option_get_infos(
  keys: readonly string[] | null,
  i18n: boolean,
  i18n_only: boolean = false,
): string {
  const toks = keys === null || keys.length === 0
    ? (i18n_only ? [] : [NONE])
    : [...keys];
  if (i18n) toks.push(OPTKEY_GET_I18N_DESCS);
  return `${MsgType.GAMEOPTIONGETINFOS}${sep}${toks.join(sep2)}`;
}

export function game_option_get_defaults(): string {
  return `${MsgType.GAMEOPTIONGETDEFAULTS}${sep}`;
}

export function change_face(game: string, pn: number, face_id: number): string {
  return line(MsgType.CHANGEFACE, game, pn, face_id);
}

export function server_ping(sleep_time: number): string {
  return line(MsgType.SERVERPING, sleep_time);
}

export function version(
  vers: number,
  vers_str: string,
  build: string,
  feats: string,
  locale: string | null,
): string {
  const fields: (string | number)[] = [vers, vers_str, build, feats];
  if (locale !== null) fields.push(locale);
  return line(MsgType.VERSION, ...fields);
}

/*
 * ask for localized strings of `stype` by key
 */
export function localized_strings(stype: string, keys: readonly string[]): string {
  return [MsgType.LOCALIZEDSTRINGS, stype, '0', ...keys].join(sep);
}

/*
 * ask about the given scenario keys, and with `any_changed`, about every
 * scenario changed since our version
 */
export function scenario_info(keys: readonly string[], any_changed: boolean): string {
  const toks = [...keys];
  if (any_changed) toks.push(MARKER_ANY_CHANGED);
  return [MsgType.SCENARIOINFO, ...toks].join(sep);
}
