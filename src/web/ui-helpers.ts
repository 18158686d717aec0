/**
 * UI helpers shared by the tile builders
 *
 * Event registration by element ID, light predicates, captions and the
 * edit/delete button widget.
 */

import { GroupName, Light, LightGroups, Lights } from '../hue/lights';
import { traceAndThrow } from '../trace';
import { ClientSession, ElementHandle } from './client-session';
import { escapeHtml, scriptLiteral } from './html';

// Opacities used for enabled and disabled elements
export const enabledOpacity = 1.0;
export const disabledOpacity = 0.3;

/** Brightness step for the brightness widgets, out of 255 */
export const brightnessChange = 25;

// Captions for the show / hide group button
export const grpShownCaption = 'Hide ◄';
export const grpHiddenCaption = 'Show ►';

/**
 * Look up an element the page is expected to contain. A missing element means
 * the caller references an ID that was never rendered, so this traces and
 * throws instead of returning null.
 */
export async function getElementByIdSafe(session: ClientSession, elementID: string): Promise<ElementHandle> {
  let element: ElementHandle | null;
  try {
    element = await session.getElementById(elementID);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return traceAndThrow(`getElementByIdSafe: Lookup of element ID ${elementID} failed: ${message}`);
  }
  if (!element) {
    return traceAndThrow(`getElementByIdSafe: Invalid element ID: ${elementID}`);
  }
  return element;
}

/*
 * Event registration directly on an element ID string. The handler never needs
 * a handle to the element, so nothing waits for the browser: the binding
 * script is buffered with everything else the page's actions produce and goes
 * out in the single flush after them.
 */

export function onElementIDClick(
  session: ClientSession,
  elementID: string,
  handler: () => unknown,
): void {
  const token = session.exportCallback(() => handler());
  session.runFunction(
    `document.querySelector(${scriptLiteral('#' + elementID)})` +
    `.addEventListener('click', function () { window.lightDeck.call(${scriptLiteral(token)}, []); });`,
  );
}

export function onElementIDMouseDown(
  session: ClientSession,
  elementID: string,
  handler: (x: number, y: number) => unknown,
): void {
  const token = session.exportCallback(([x = 0, y = 0]) => handler(x, y));
  session.runFunction(
    `document.querySelector(${scriptLiteral('#' + elementID)})` +
    `.addEventListener('mousedown', function (e) {` +
    ` var r = this.getBoundingClientRect();` +
    ` var offsLeft = r.left + window.pageXOffset, offsTop = r.top + window.pageYOffset;` +
    ` window.lightDeck.call(${scriptLiteral(token)},` +
    ` [Math.round(e.pageX - offsLeft), Math.round(e.pageY - offsTop)]); });`,
  );
}

// TODO: Reload the affected tile instead of the whole page
export function reloadPage(session: ClientSession): void {
  session.runFunction('window.location.reload(false);');
}

export function anyLightsOn(lights: Lights): boolean {
  for (const light of lights.values()) {
    if (light.state.on) return true;
  }
  return false;
}

export function anyLightsInGroup(
  groupName: GroupName,
  groups: LightGroups,
  lights: Lights,
  condition: (light: Light) => boolean,
): boolean {
  const groupLights = groups.get(groupName);
  if (!groupLights) return false;
  for (const lightID of groupLights) {
    const light = lights.get(lightID);
    if (light && condition(light)) return true;
  }
  return false;
}

export function truncateEllipsis(maxLength: number, str: string): string {
  const chars = Array.from(str);
  return chars.length > maxLength ? chars.slice(0, maxLength).join('') + '…' : str;
}

function showOtherScript(targetDivID: string): string {
  return `this.parentNode.style.display = 'none'; ` +
    `document.getElementById('${targetDivID}').style.display = 'block';`;
}

/**
 * Edit and delete buttons. Delete does not act directly: it swaps the group
 * for a hidden one holding a back button and the actual Confirm button, whose
 * click handler the caller registers by deleteConfirmBtnID.
 */
// TODO: Make the delete button small and the edit button large
export function addEditAndDeleteButton(
  editDeleteDivID: string,
  editBtnOnClick: string,
  deleteConfirmDivID: string,
  deleteConfirmBtnID: string,
): string {
  return (
    `<div id="${escapeHtml(deleteConfirmDivID)}" class="btn-group btn-group-sm" style="display: none;">` +
      `<button type="button" class="btn btn-scene btn-sm" onclick="${escapeHtml(showOtherScript(editDeleteDivID))}">` +
        `<span class="glyphicon glyphicon-chevron-left edit-back-btn"></span>` +
      `</button>` +
      `<button type="button" id="${escapeHtml(deleteConfirmBtnID)}" class="btn btn-danger btn-sm delete-confirm-btn">Confirm</button>` +
    `</div>` +
    `<div id="${escapeHtml(editDeleteDivID)}" class="btn-group btn-group-sm">` +
      `<button type="button" class="btn btn-scene btn-sm" onclick="${escapeHtml(editBtnOnClick)}">` +
        `<span class="glyphicon glyphicon-th-list edit-back-btn"></span>` +
      `</button>` +
      `<button type="button" class="btn btn-danger btn-sm delete-confirm-btn" onclick="${escapeHtml(showOtherScript(deleteConfirmDivID))}">Delete</button>` +
    `</div>`
  );
}
