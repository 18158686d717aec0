import { BridgeConfig } from '../hue/bridge-config';
import { Light, LightControl, LightID, Lights } from '../hue/lights';

export const testBridgeConfig: BridgeConfig = {
  name: 'Test Bridge',
  zigbeeChannel: 11,
  bridgeID: '001788FFFE00AB12',
  mac: '00:17:88:00:ab:12',
  ipAddress: '192.168.0.40',
  netmask: '255.255.255.0',
  gateway: '192.168.0.1',
  modelID: 'BSB002',
  swVersion: '1711151408',
  apiVersion: '1.22.0',
  swUpdate: {
    updateState: 2,
    checkForUpdate: false,
    url: '',
    text: 'Fixes & more',
    notify: true,
  },
  linkButton: false,
  portalServices: true,
  portalConnection: 'connected',
  portalState: {
    signedOn: true,
    incoming: false,
    outgoing: true,
    communication: 'connected',
  },
  factoryNew: false,
};

/** Light control that records every command instead of reaching a bridge */
export class RecordingLightControl implements LightControl {
  readonly commands: string[] = [];
  private readonly lights: Map<LightID, Light>;

  constructor(lights: Light[]) {
    this.lights = new Map(lights.map(l => [l.id, l]));
  }

  getLights(): Lights {
    return this.lights;
  }

  async setLightOn(lightID: LightID, on: boolean): Promise<void> {
    this.commands.push(`on:${lightID}:${on}`);
  }

  async changeBrightness(lightID: LightID, delta: number): Promise<void> {
    this.commands.push(`bri:${lightID}:${delta}`);
  }
}

/** Callback token bound to an element in a batch of binding scripts */
export function tokenFor(scripts: string[], elementID: string): string {
  const script = scripts.find(s => s.startsWith(`document.querySelector("#${elementID}")`));
  const match = script?.match(/window\.lightDeck\.call\("(cb-\d+)"/);
  if (!match) {
    throw new Error(`No binding for element ${elementID}`);
  }
  return match[1];
}
