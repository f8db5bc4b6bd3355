import { SafeAreaMargins, RenderProfile } from "../types/models";

const VERTICAL_FRAME = { width: 1080, height: 1920, fps: 30 };

export const RENDER_PROFILES: Readonly<Record<string, RenderProfile>> = Object.freeze({
  tiktok: {
    name: "tiktok",
    ...VERTICAL_FRAME,
    safeArea: { top: 0.12, bottom: 0.18, left: 0.08, right: 0.08 },
    subtitleFont: "Proxima Nova",
    fontSize: 40,
    outline: 3,
    shadow: 2,
  },
  reels: {
    name: "reels",
    ...VERTICAL_FRAME,
    safeArea: { top: 0.08, bottom: 0.16, left: 0.08, right: 0.08 },
    subtitleFont: "Instagram Sans",
    fontSize: 40,
    outline: 3,
    shadow: 2,
  },
  youtube_shorts: {
    name: "youtube_shorts",
    ...VERTICAL_FRAME,
    safeArea: { top: 0.08, bottom: 0.12, left: 0.08, right: 0.08 },
    subtitleFont: "Roboto",
    fontSize: 42,
    outline: 2,
    shadow: 1,
  },
});

export const DEFAULT_PROFILE = "tiktok";

export const listProfiles = (): RenderProfile[] => Object.values(RENDER_PROFILES);

export const getProfile = (name: string): RenderProfile | undefined =>
  Object.prototype.hasOwnProperty.call(RENDER_PROFILES, name) ? RENDER_PROFILES[name] : undefined;

/**
 * Margins the validator checks against: the profile's widest inset per axis,
 * never below the configured fractions.
 */
export const profileMargins = (profile: RenderProfile, configured: SafeAreaMargins): SafeAreaMargins => ({
  horizontal: Math.max(profile.safeArea.left, profile.safeArea.right, configured.horizontal),
  vertical: Math.max(profile.safeArea.top, profile.safeArea.bottom, configured.vertical),
});
