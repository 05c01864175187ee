/**
 * Release / InRelease file parsing
 */

import { parseControl, field, booleanField, stripClearsign } from './control.js';

/**
 * Release file information relevant to pinning and attribution
 */
export interface ReleaseInfo {
  /** "Suite" field */
  archive?: string;
  codename?: string;
  origin?: string;
  label?: string;
  version?: string;
  notAutomatic: boolean;
  butAutomaticUpgrades: boolean;
}

/**
 * Parse Release or InRelease content. Only the first paragraph is read;
 * an empty file yields a release without attributes.
 */
export function parseRelease(content: string): ReleaseInfo {
  const [paragraph] = parseControl(stripClearsign(content));
  if (!paragraph) {
    return { notAutomatic: false, butAutomaticUpgrades: false };
  }

  return {
    archive: field(paragraph, 'Suite') || undefined,
    codename: field(paragraph, 'Codename') || undefined,
    origin: field(paragraph, 'Origin') || undefined,
    label: field(paragraph, 'Label') || undefined,
    version: field(paragraph, 'Version') || undefined,
    notAutomatic: booleanField(paragraph, 'NotAutomatic'),
    butAutomaticUpgrades: booleanField(paragraph, 'ButAutomaticUpgrades'),
  };
}
