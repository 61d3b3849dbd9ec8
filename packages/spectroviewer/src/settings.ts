/**
 * User-facing display settings, shared by every renderer on a page.
 */

import { DEFAULT_QUANTIZATION, DEFAULT_RANGE_OPTIONS } from "@noisescope/acoustics";
import { z } from "zod";
import { createStore, type StoreApi } from "zustand/vanilla";

import { PALETTE_NAMES, type PaletteName } from "./colormap.js";

export const displaySettingsSchema = z
  .object({
    palette: z.enum(PALETTE_NAMES),
    dbFloor: z.number().finite(),
    dbCeil: z.number().finite(),
    loPercentile: z.number().min(0).max(1),
    hiPercentile: z.number().min(0).max(1),
  })
  .refine((s) => s.dbCeil > s.dbFloor, { message: "dbCeil must be greater than dbFloor" })
  .refine((s) => s.loPercentile <= s.hiPercentile, {
    message: "loPercentile must not exceed hiPercentile",
  });

export type DisplaySettings = z.infer<typeof displaySettingsSchema>;

interface DisplaySettingsActions {
  /** Apply a validated patch; returns false (and keeps state) when invalid */
  update: (patch: Partial<DisplaySettings>) => boolean;
  setPalette: (palette: PaletteName) => boolean;
  reset: () => void;
}

export type DisplaySettingsState = DisplaySettings & DisplaySettingsActions;

export type DisplaySettingsStore = StoreApi<DisplaySettingsState>;

export const DEFAULT_DISPLAY_SETTINGS: DisplaySettings = {
  palette: "viridis",
  dbFloor: DEFAULT_QUANTIZATION.dbFloor,
  dbCeil: DEFAULT_QUANTIZATION.dbCeil,
  loPercentile: DEFAULT_RANGE_OPTIONS.loPercentile,
  hiPercentile: DEFAULT_RANGE_OPTIONS.hiPercentile,
};

function pickSettings(state: DisplaySettingsState): DisplaySettings {
  const { palette, dbFloor, dbCeil, loPercentile, hiPercentile } = state;
  return { palette, dbFloor, dbCeil, loPercentile, hiPercentile };
}

export function createDisplaySettingsStore(
  initial: Partial<DisplaySettings> = {}
): DisplaySettingsStore {
  const initialState = displaySettingsSchema.parse({ ...DEFAULT_DISPLAY_SETTINGS, ...initial });

  return createStore<DisplaySettingsState>()((set, get) => ({
    ...initialState,

    update: (patch) => {
      const next = displaySettingsSchema.safeParse({ ...pickSettings(get()), ...patch });
      if (!next.success) {
        console.warn(
          `@noisescope/spectroviewer: rejected display settings update: ${next.error.issues[0]?.message ?? "invalid"}`
        );
        return false;
      }
      set(next.data);
      return true;
    },

    setPalette: (palette) => get().update({ palette }),

    reset: () => set(initialState),
  }));
}

/** Current settings without the action functions */
export function readSettings(store: DisplaySettingsStore): DisplaySettings {
  return pickSettings(store.getState());
}
