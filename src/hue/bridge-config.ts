/**
 * Bridge configuration records
 *
 * Decoders for the two shapes returned by the bridge's config endpoint:
 *   GET /api/config          → BridgeConfigNoWhitelist (no paired user needed)
 *   GET /api/<user>/config   → BridgeConfig (whitelisted user only)
 *
 * Only a selection of the fields the bridge reports is kept. Unknown keys are
 * ignored; required keys fail the whole decode. `swupdate` and `portalstate`
 * are optional and decode to undefined when the bridge leaves them out.
 */

import { z } from 'zod';

// --- Wire schemas ---

const swUpdateSchema = z.object({
  updatestate: z.number().int().safe(),
  checkforupdate: z.boolean(),
  url: z.string(),
  text: z.string(),
  notify: z.boolean(),
});

const portalStateSchema = z.object({
  signedon: z.boolean(),
  incoming: z.boolean(),
  outgoing: z.boolean(),
  communication: z.string(),
});

const bridgeConfigNoWhitelistSchema = z.object({
  swversion: z.string(),
  apiversion: z.string(),
  name: z.string(),
  mac: z.string(),
});

const bridgeConfigSchema = z.object({
  name: z.string(),
  zigbeechannel: z.number().int().safe(),
  bridgeid: z.string(),
  mac: z.string(),
  ipaddress: z.string(),
  netmask: z.string(),
  gateway: z.string(),
  modelid: z.string(),
  swversion: z.string(),
  apiversion: z.string(),
  swupdate: swUpdateSchema.nullish(),
  linkbutton: z.boolean(),
  portalservices: z.boolean(),
  portalconnection: z.string(),
  portalstate: portalStateSchema.nullish(),
  factorynew: z.boolean(),
});

export type SWUpdateJSON = z.infer<typeof swUpdateSchema>;
export type PortalStateJSON = z.infer<typeof portalStateSchema>;
export type BridgeConfigJSON = z.infer<typeof bridgeConfigSchema>;

// --- Records ---

export interface BridgeConfigNoWhitelist {
  readonly swVersion: string;
  readonly apiVersion: string;
  readonly name: string;
  readonly mac: string;
}

export interface SWUpdate {
  readonly updateState: number;
  readonly checkForUpdate: boolean;
  readonly url: string;
  readonly text: string;
  readonly notify: boolean;
}

export interface PortalState {
  readonly signedOn: boolean;
  readonly incoming: boolean;
  readonly outgoing: boolean;
  readonly communication: string;
}

export interface BridgeConfig {
  readonly name: string;
  readonly zigbeeChannel: number;
  readonly bridgeID: string;
  readonly mac: string;
  readonly ipAddress: string;
  readonly netmask: string;
  readonly gateway: string;
  readonly modelID: string;
  readonly swVersion: string;
  readonly apiVersion: string;
  readonly swUpdate?: SWUpdate;
  readonly linkButton: boolean;
  readonly portalServices: boolean;
  readonly portalConnection: string;
  readonly portalState?: PortalState;
  readonly factoryNew: boolean;
}

export type BridgeConfigResponse =
  | { whitelisted: true; config: BridgeConfig }
  | { whitelisted: false; config: BridgeConfigNoWhitelist };

// --- Errors ---

export class DecodeError extends Error {
  /** JSON path of the offending value, `$` for the document root */
  readonly path: string;

  constructor(record: string, path: string, detail: string) {
    super(`${record}: ${detail}`);
    this.name = 'DecodeError';
    this.path = path;
  }
}

function jsonPath(segments: ReadonlyArray<string | number>): string {
  return segments.reduce<string>(
    (acc, seg) => (typeof seg === 'number' ? `${acc}[${seg}]` : `${acc}.${seg}`),
    '$',
  );
}

function toDecodeError(record: string, error: z.ZodError): DecodeError {
  // Decoding stops at the first violation, like a hand-written parser would
  const issue = error.issues[0];
  if (!issue) {
    return new DecodeError(record, '$', 'invalid input');
  }
  const path = jsonPath(issue.path);

  if (issue.code === z.ZodIssueCode.invalid_type) {
    const key = issue.path[issue.path.length - 1];
    if (issue.received === 'undefined' && key !== undefined) {
      return new DecodeError(record, path, `missing required key "${key}" at ${path}`);
    }
    if (issue.expected === 'object') {
      return new DecodeError(record, path, `Expected object at ${path}, received ${issue.received}`);
    }
    return new DecodeError(record, path, `expected ${issue.expected} at ${path}, received ${issue.received}`);
  }
  if (issue.code === z.ZodIssueCode.too_big || issue.code === z.ZodIssueCode.too_small) {
    return new DecodeError(record, path, `integer out of range at ${path}`);
  }
  return new DecodeError(record, path, `${issue.message} at ${path}`);
}

// --- Decoders ---

function toSWUpdate(json: SWUpdateJSON): SWUpdate {
  return {
    updateState: json.updatestate,
    checkForUpdate: json.checkforupdate,
    url: json.url,
    text: json.text,
    notify: json.notify,
  };
}

function toPortalState(json: PortalStateJSON): PortalState {
  return {
    signedOn: json.signedon,
    incoming: json.incoming,
    outgoing: json.outgoing,
    communication: json.communication,
  };
}

export function decodeBridgeConfigNoWhitelist(json: unknown): BridgeConfigNoWhitelist {
  const result = bridgeConfigNoWhitelistSchema.safeParse(json);
  if (!result.success) {
    throw toDecodeError('BridgeConfigNoWhitelist', result.error);
  }
  const d = result.data;
  return {
    swVersion: d.swversion,
    apiVersion: d.apiversion,
    name: d.name,
    mac: d.mac,
  };
}

export function decodeBridgeConfig(json: unknown): BridgeConfig {
  const result = bridgeConfigSchema.safeParse(json);
  if (!result.success) {
    throw toDecodeError('BridgeConfig', result.error);
  }
  const d = result.data;
  return {
    name: d.name,
    zigbeeChannel: d.zigbeechannel,
    bridgeID: d.bridgeid,
    mac: d.mac,
    ipAddress: d.ipaddress,
    netmask: d.netmask,
    gateway: d.gateway,
    modelID: d.modelid,
    swVersion: d.swversion,
    apiVersion: d.apiversion,
    swUpdate: d.swupdate ? toSWUpdate(d.swupdate) : undefined,
    linkButton: d.linkbutton,
    portalServices: d.portalservices,
    portalConnection: d.portalconnection,
    portalState: d.portalstate ? toPortalState(d.portalstate) : undefined,
    factoryNew: d.factorynew,
  };
}

/**
 * Decode whatever the config endpoint returned. A whitelisted user gets the
 * full record; otherwise the bridge only hands out the short one. When neither
 * shape matches, the error for the full shape is the one reported.
 */
export function decodeBridgeConfigResponse(json: unknown): BridgeConfigResponse {
  try {
    return { whitelisted: true, config: decodeBridgeConfig(json) };
  } catch (fullError) {
    if (!(fullError instanceof DecodeError)) throw fullError;
    try {
      return { whitelisted: false, config: decodeBridgeConfigNoWhitelist(json) };
    } catch {
      throw fullError;
    }
  }
}

// --- Encoder ---

export function encodeBridgeConfig(config: BridgeConfig): BridgeConfigJSON {
  const json: BridgeConfigJSON = {
    name: config.name,
    zigbeechannel: config.zigbeeChannel,
    bridgeid: config.bridgeID,
    mac: config.mac,
    ipaddress: config.ipAddress,
    netmask: config.netmask,
    gateway: config.gateway,
    modelid: config.modelID,
    swversion: config.swVersion,
    apiversion: config.apiVersion,
    linkbutton: config.linkButton,
    portalservices: config.portalServices,
    portalconnection: config.portalConnection,
    factorynew: config.factoryNew,
  };
  if (config.swUpdate) {
    const u = config.swUpdate;
    json.swupdate = {
      updatestate: u.updateState,
      checkforupdate: u.checkForUpdate,
      url: u.url,
      text: u.text,
      notify: u.notify,
    };
  }
  if (config.portalState) {
    const p = config.portalState;
    json.portalstate = {
      signedon: p.signedOn,
      incoming: p.incoming,
      outgoing: p.outgoing,
      communication: p.communication,
    };
  }
  return json;
}
