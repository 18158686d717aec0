/**
 * Dashboard page
 *
 * Builds the tiles of the dashboard into a PageAccumulator: the bridge tile,
 * one tile per light and one per user-defined group. Every tile registers
 * the UI actions that wire its buttons up once the page is live.
 */

import { AppStateCell, modifyPersistConfig, persistConfigView } from './app-state';
import { BridgeConfig } from './hue/bridge-config';
import { GroupName, Light, LightControl, LightGroups, LightID, Lights } from './hue/lights';
import { UserID, deleteLightGroup, queryUserData, toggleGroupVisibility } from './persist-config';
import { buildGroupID, buildLightID } from './web/element-ids';
import { escapeHtml } from './web/html';
import { PageAccumulator } from './web/page';
import {
  addEditAndDeleteButton,
  anyLightsInGroup,
  anyLightsOn,
  brightnessChange,
  disabledOpacity,
  enabledOpacity,
  grpHiddenCaption,
  grpShownCaption,
  onElementIDClick,
  onElementIDMouseDown,
  reloadPage,
  truncateEllipsis,
} from './web/ui-helpers';

/** Width of the brightness bar in CSS pixels, must match .brightness-bar */
export const BRIGHTNESS_BAR_WIDTH = 200;

const MAX_TITLE_LENGTH = 30;

export const BRIDGE_SWITCH_ID = 'bridge-all-switch';

export interface DashboardContext {
  app: AppStateCell;
  lightControl: LightControl;
  userID: UserID;
}

function byLightID(a: LightID, b: LightID): number {
  return a.localeCompare(b, undefined, { numeric: true });
}

function row(label: string, value: string): string {
  return `<div class="tile-row">${escapeHtml(label)}: <span class="val">${escapeHtml(value)}</span></div>`;
}

function switchLights(control: LightControl, lightIDs: Iterable<LightID>, on: boolean): Promise<void[]> {
  return Promise.all(Array.from(lightIDs, id => control.setLightOn(id, on)));
}

export function buildDashboardPage(page: PageAccumulator, ctx: DashboardContext): void {
  const { bridgeConfig } = ctx.app.read();
  const groups = persistConfigView(ctx.app).read().lightGroups;
  const lights = ctx.lightControl.getLights();

  addBridgeTile(page, ctx, bridgeConfig, lights);

  for (const lightID of Array.from(lights.keys()).sort(byLightID)) {
    const light = lights.get(lightID);
    if (light) addLightTile(page, ctx, light);
  }

  for (const groupName of Array.from(groups.keys()).sort()) {
    addGroupTile(page, ctx, groupName, groups, lights);
  }
}

export function addBridgeTile(
  page: PageAccumulator,
  ctx: DashboardContext,
  bc: BridgeConfig,
  lights: Lights,
): void {
  const anyOn = anyLightsOn(lights);

  let html = `<div class="tile" id="bridge-tile">`;
  html += `<div class="tile-title">${escapeHtml(truncateEllipsis(MAX_TITLE_LENGTH, bc.name))}</div>`;
  html += row('Model', bc.modelID);
  html += row('Bridge ID', bc.bridgeID);
  html += row('IP', bc.ipAddress);
  html += row('API', bc.apiVersion);
  html += row('Firmware', bc.swVersion);
  html += row('ZigBee channel', String(bc.zigbeeChannel));
  if (bc.swUpdate && bc.swUpdate.updateState !== 0) {
    html += `<div class="tile-row update-text">Update: ${escapeHtml(bc.swUpdate.text)}</div>`;
  }
  if (bc.portalState) {
    html += row('Portal', bc.portalState.communication);
  }
  html += `<div class="btn-group">` +
    `<button type="button" id="${BRIDGE_SWITCH_ID}" class="btn${anyOn ? ' on' : ''}">` +
    `${anyOn ? 'All Off' : 'All On'}</button></div>`;
  html += `</div>`;
  page.addTile(html);

  page.addAction((session) => {
    onElementIDClick(session, BRIDGE_SWITCH_ID, async () => {
      await switchLights(ctx.lightControl, lights.keys(), !anyOn);
      reloadPage(session);
    });
  });
}

export function addLightTile(page: PageAccumulator, ctx: DashboardContext, light: Light): void {
  const switchID = buildLightID(light.id, 'switch');
  const barID = buildLightID(light.id, 'brightness-container');
  const tileID = buildLightID(light.id, 'tile');
  const { on } = light.state;
  const percent = Math.round(((light.state.brightness ?? 0) / 255) * 100);

  page.addTile(
    `<div class="tile" id="${escapeHtml(tileID)}">` +
      `<div class="tile-title">${escapeHtml(truncateEllipsis(MAX_TITLE_LENGTH, light.name))}</div>` +
      `<div class="btn-group">` +
        `<button type="button" id="${escapeHtml(switchID)}" class="btn${on ? ' on' : ''}">${on ? 'On' : 'Off'}</button>` +
      `</div>` +
      `<div id="${escapeHtml(barID)}" class="brightness-bar" style="opacity: ${on ? enabledOpacity : disabledOpacity};">` +
        `<div class="brightness-fill" style="width: ${percent}%;"></div>` +
      `</div>` +
    `</div>`,
  );

  page.addAction((session) => {
    onElementIDClick(session, switchID, async () => {
      await ctx.lightControl.setLightOn(light.id, !on);
      reloadPage(session);
    });
    onElementIDMouseDown(session, barID, async (x) => {
      const delta = x < BRIGHTNESS_BAR_WIDTH / 2 ? -brightnessChange : brightnessChange;
      await ctx.lightControl.changeBrightness(light.id, delta);
      reloadPage(session);
    });
  });
}

export function addGroupTile(
  page: PageAccumulator,
  ctx: DashboardContext,
  groupName: GroupName,
  groups: LightGroups,
  lights: Lights,
): void {
  const members = groups.get(groupName) ?? new Set<LightID>();
  const visible = queryUserData(persistConfigView(ctx.app), ctx.userID, ud => ud.visibleGroupNames.has(groupName));
  const anyOn = anyLightsInGroup(groupName, groups, lights, l => l.state.on);

  const showBtnID = buildGroupID(groupName, 'show-btn');
  const switchID = buildGroupID(groupName, 'switch');
  const editDeleteDivID = buildGroupID(groupName, 'edit-delete');
  const deleteConfirmDivID = buildGroupID(groupName, 'delete-confirm');
  const deleteConfirmBtnID = buildGroupID(groupName, 'delete-confirm-btn');

  const memberRows = Array.from(members)
    .sort(byLightID)
    .map(id => `<div class="tile-row">${escapeHtml(lights.get(id)?.name ?? `Light ${id}`)}</div>`)
    .join('');

  page.addTile(
    `<div class="tile" id="${buildGroupID(groupName, 'tile')}">` +
      `<div class="tile-title">${escapeHtml(truncateEllipsis(MAX_TITLE_LENGTH, groupName))}</div>` +
      `<div class="btn-group">` +
        `<button type="button" id="${showBtnID}" class="btn">${visible ? grpShownCaption : grpHiddenCaption}</button>` +
        `<button type="button" id="${switchID}" class="btn${anyOn ? ' on' : ''}">${anyOn ? 'On' : 'Off'}</button>` +
      `</div>` +
      `<div class="group-members${visible ? ' visible' : ''}">${memberRows}</div>` +
      addEditAndDeleteButton(
        editDeleteDivID,
        "this.closest('.tile').classList.toggle('editing');",
        deleteConfirmDivID,
        deleteConfirmBtnID,
      ) +
    `</div>`,
  );

  page.addAction((session) => {
    onElementIDClick(session, showBtnID, async () => {
      await modifyPersistConfig(ctx.app, pc => toggleGroupVisibility(pc, ctx.userID, groupName));
      reloadPage(session);
    });
    onElementIDClick(session, switchID, async () => {
      const present = Array.from(members).filter(id => lights.has(id));
      await switchLights(ctx.lightControl, present, !anyOn);
      reloadPage(session);
    });
    onElementIDClick(session, deleteConfirmBtnID, async () => {
      await modifyPersistConfig(ctx.app, pc => deleteLightGroup(pc, groupName));
      reloadPage(session);
    });
  });
}
