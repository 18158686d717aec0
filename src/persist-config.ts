/**
 * Persisted configuration
 *
 * Per-user dashboard preferences and the user-defined light groups. The
 * value is shared by every session and lives in a TransactionalCell; the
 * helpers here are pure and return new values.
 */

import { GroupName, LightGroups, LightID } from './hue/lights';
import { ReadableCell } from './transactional-cell';

export type UserID = string;

export interface UserData {
  readonly visibleGroupNames: ReadonlySet<GroupName>;
}

export interface PersistConfig {
  readonly userData: ReadonlyMap<UserID, UserData>;
  readonly lightGroups: LightGroups;
}

export const defaultUserData: UserData = {
  visibleGroupNames: new Set(),
};

export const defaultPersistConfig: PersistConfig = {
  userData: new Map(),
  lightGroups: new Map(),
};

export function getUserData(cell: ReadableCell<PersistConfig>, userID: UserID): UserData {
  return cell.read().userData.get(userID) ?? defaultUserData;
}

/** Apply a getter to the user data of the passed user ID */
export function queryUserData<A>(
  cell: ReadableCell<PersistConfig>,
  userID: UserID,
  getter: (userData: UserData) => A,
): A {
  return getter(getUserData(cell, userID));
}

export function setUserData(pc: PersistConfig, userID: UserID, userData: UserData): PersistConfig {
  const userDataMap = new Map(pc.userData);
  userDataMap.set(userID, userData);
  return { ...pc, userData: userDataMap };
}

export function toggleGroupVisibility(pc: PersistConfig, userID: UserID, groupName: GroupName): PersistConfig {
  const current = pc.userData.get(userID) ?? defaultUserData;
  const visible = new Set(current.visibleGroupNames);
  if (visible.has(groupName)) {
    visible.delete(groupName);
  } else {
    visible.add(groupName);
  }
  return setUserData(pc, userID, { ...current, visibleGroupNames: visible });
}

export function setLightGroup(pc: PersistConfig, groupName: GroupName, members: Iterable<LightID>): PersistConfig {
  const groups = new Map(pc.lightGroups);
  groups.set(groupName, new Set(members));
  return { ...pc, lightGroups: groups };
}

/**
 * Remove a group and forget it in every user's visible set, so a group
 * re-created under the same name starts hidden.
 */
export function deleteLightGroup(pc: PersistConfig, groupName: GroupName): PersistConfig {
  if (!pc.lightGroups.has(groupName)) return pc;
  const groups = new Map(pc.lightGroups);
  groups.delete(groupName);

  const userDataMap = new Map<UserID, UserData>();
  for (const [userID, data] of pc.userData) {
    if (data.visibleGroupNames.has(groupName)) {
      const visible = new Set(data.visibleGroupNames);
      visible.delete(groupName);
      userDataMap.set(userID, { ...data, visibleGroupNames: visible });
    } else {
      userDataMap.set(userID, data);
    }
  }
  return { userData: userDataMap, lightGroups: groups };
}
