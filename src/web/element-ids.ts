/**
 * DOM element IDs
 *
 * Built in one place because the UI actions locate the elements again by
 * these IDs once the page is live.
 */

import * as crypto from 'crypto';
import { GroupName, LightID } from '../hue/lights';

export function buildLightID(lightID: LightID, elementName: string): string {
  return `light-${lightID}-${elementName}`;
}

/** Stable 64-bit hex digest of a group name */
export function hashGroupName(groupName: GroupName): string {
  return crypto.createHash('sha256').update(groupName, 'utf8').digest('hex').slice(0, 16);
}

export function buildGroupID(groupName: GroupName, elementName: string): string {
  // Group names are user text and may hold characters not valid in element IDs
  return `light-${hashGroupName(groupName)}-${elementName}`;
}
