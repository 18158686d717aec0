/**
 * Light and group model
 *
 * Light IDs are the bridge's own identifiers ("1", "2", ...) and only ever
 * contain identifier-safe characters. Group names are free text typed by the
 * user.
 */

export type LightID = string;
export type GroupName = string;

export interface LightState {
  on: boolean;
  /** 0-255 */
  brightness?: number;
}

export interface Light {
  id: LightID;
  name: string;
  state: LightState;
}

export type Lights = ReadonlyMap<LightID, Light>;
export type LightGroups = ReadonlyMap<GroupName, ReadonlySet<LightID>>;

/**
 * The part of the bridge communication layer the dashboard talks to.
 * Implementations own polling and reconciliation; the dashboard only reads
 * the latest light snapshot and issues commands.
 */
export interface LightControl {
  getLights(): Lights;
  setLightOn(lightID: LightID, on: boolean): Promise<void>;
  changeBrightness(lightID: LightID, delta: number): Promise<void>;
}

export class BridgeLinkError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BridgeLinkError';
  }
}

/** Stands in until a bridge link is configured: no lights, every command refused */
export class UnlinkedLightControl implements LightControl {
  getLights(): Lights {
    return new Map();
  }

  async setLightOn(lightID: LightID): Promise<void> {
    throw new BridgeLinkError(`No bridge link, cannot switch light ${lightID}`);
  }

  async changeBrightness(lightID: LightID): Promise<void> {
    throw new BridgeLinkError(`No bridge link, cannot dim light ${lightID}`);
  }
}
