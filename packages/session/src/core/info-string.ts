/**
 * Backslash-delimited key/value strings (`\name\player\rate\25000`) used for
 * client userinfo.
 *
 * @module core/info-string
 */

import { MAX_INFO_STRING } from "../constants.js";

const FORBIDDEN = /[\\;"]/;

/**
 * Split an info string into ordered pairs. A trailing key with no value
 * gets the empty string.
 */
export function parseInfoString(info: string): Array<[string, string]> {
  const body = info.startsWith("\\") ? info.slice(1) : info;
  if (body === "") {
    return [];
  }
  const parts = body.split("\\");
  const pairs: Array<[string, string]> = [];
  for (let i = 0; i < parts.length; i += 2) {
    pairs.push([parts[i] ?? "", parts[i + 1] ?? ""]);
  }
  return pairs;
}

/**
 * Look up a key (case-insensitive). Missing keys read as "".
 */
export function infoValueForKey(info: string, key: string): string {
  const wanted = key.toLowerCase();
  for (const [k, v] of parseInfoString(info)) {
    if (k.toLowerCase() === wanted) {
      return v;
    }
  }
  return "";
}

export function removeInfoKey(info: string, key: string): string {
  const wanted = key.toLowerCase();
  return parseInfoString(info)
    .filter(([k]) => k.toLowerCase() !== wanted)
    .map(([k, v]) => `\\${k}\\${v}`)
    .join("");
}

/**
 * Set a key, placing it first. An empty value removes the key.
 * Keys or values containing `\`, `;` or `"` are refused, as is a result of
 * `maxLength` or more characters; in both cases the input comes back unchanged.
 */
export function setInfoValueForKey(
  info: string,
  key: string,
  value: string,
  maxLength: number = MAX_INFO_STRING,
): string {
  if (FORBIDDEN.test(key) || FORBIDDEN.test(value)) {
    return info;
  }
  const rest = removeInfoKey(info, key);
  if (value === "") {
    return rest;
  }
  const updated = `\\${key}\\${value}${rest}`;
  if (updated.length >= maxLength) {
    return info;
  }
  return updated;
}
