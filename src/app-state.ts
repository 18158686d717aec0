/**
 * Application state
 *
 * One AppState per running application session: the persisted
 * configuration plus the last bridge configuration fetched. Request
 * handlers thread it through state-passing steps; the cell serializes the
 * steps so each one sees the state left by the previous.
 */

import { BridgeConfig } from './hue/bridge-config';
import { PersistConfig, defaultPersistConfig } from './persist-config';
import { ReadableCell, TransactionalCell } from './transactional-cell';

export interface AppState {
  readonly persistConfig: PersistConfig;
  readonly bridgeConfig: BridgeConfig;
}

export interface AppStepResult<R> {
  result: R;
  state: AppState;
}

export type AppStep<R> = (state: AppState) => AppStepResult<R> | Promise<AppStepResult<R>>;

export type AppStateCell = TransactionalCell<AppState>;

export function createAppState(
  bridgeConfig: BridgeConfig,
  persistConfig: PersistConfig = defaultPersistConfig,
): AppStateCell {
  return new TransactionalCell<AppState>({ persistConfig, bridgeConfig });
}

/** Run one state-passing step atomically and return its result */
export function runAppStep<R>(cell: AppStateCell, step: AppStep<R>): Promise<R> {
  return cell.modify(async (state) => {
    const out = await step(state);
    return { value: out.state, result: out.result };
  });
}

export function persistConfigView(cell: AppStateCell): ReadableCell<PersistConfig> {
  return cell.view(state => state.persistConfig);
}

export function modifyPersistConfig(
  cell: AppStateCell,
  fn: (pc: PersistConfig) => PersistConfig,
): Promise<AppState> {
  return cell.update(state => ({ ...state, persistConfig: fn(state.persistConfig) }));
}

export function setBridgeConfig(cell: AppStateCell, bridgeConfig: BridgeConfig): Promise<AppState> {
  return cell.update(state => ({ ...state, bridgeConfig }));
}
