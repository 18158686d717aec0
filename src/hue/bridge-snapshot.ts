/**
 * Bridge snapshot loading
 *
 * The dashboard starts from a saved copy of the bridge's config endpoint
 * response. Fetching it live belongs to the bridge communication layer.
 */

import * as fs from 'fs';
import { BridgeConfigResponse, decodeBridgeConfigResponse } from './bridge-config';

export function loadBridgeSnapshot(filePath: string): BridgeConfigResponse {
  if (!fs.existsSync(filePath)) {
    throw new Error(`[Bridge] No bridge config snapshot at ${filePath}`);
  }
  const raw = fs.readFileSync(filePath, 'utf-8');
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`[Bridge] ${filePath} is not valid JSON: ${message}`);
  }
  return decodeBridgeConfigResponse(json);
}
