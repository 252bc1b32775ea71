import { ValidationError } from "@pulse/shared";

/** "garmin.com", "garmin.cn", or any other Connect-compatible hostname. */
export type GarminDomain = "garmin.com" | "garmin.cn" | (string & {});

export const DEFAULT_DOMAIN: GarminDomain = "garmin.com";

export function parseGarminDomain(input: string): GarminDomain {
  const domain = input.trim().toLowerCase();
  if (!domain || /[\s/]/.test(domain)) {
    throw new ValidationError(`Invalid Garmin domain "${input}"`);
  }
  return domain;
}

/**
 * Every Garmin Connect endpoint, rooted at the configured domain.
 */
export class UrlBuilder {
  readonly gcModern: string;
  readonly ssoOrigin: string;
  readonly gcApi: string;

  constructor(readonly domain: GarminDomain = DEFAULT_DOMAIN) {
    this.gcModern = `https://connect.${domain}/modern`;
    this.ssoOrigin = `https://sso.${domain}`;
    this.gcApi = `https://connectapi.${domain}`;
  }

  private api(path: string): string {
    return `${this.gcApi}${path}`;
  }

  // ── SSO ──────────────────────────────────────────────────────

  sso(): string {
    return `${this.ssoOrigin}/sso`;
  }

  proxy(): string {
    return `${this.gcModern}/proxy`;
  }

  ssoEmbed(): string {
    return `${this.ssoOrigin}/sso/embed`;
  }

  signin(): string {
    return `${this.sso()}/signin`;
  }

  login(): string {
    return `${this.sso()}/login`;
  }

  oauth(): string {
    return this.api("/oauth-service/oauth");
  }

  // ── Profile ──────────────────────────────────────────────────

  userSettings(): string {
    return this.api("/userprofile-service/userprofile/user-settings/");
  }

  userProfile(): string {
    return this.api("/userprofile-service/socialProfile");
  }

  // ── Activities ───────────────────────────────────────────────

  activities(): string {
    return this.api("/activitylist-service/activities/search/activities");
  }

  activity(): string {
    return this.api("/activity-service/activity/");
  }

  statActivities(): string {
    return this.api("/fitnessstats-service/activity");
  }

  downloadZip(): string {
    return this.api("/download-service/files/activity/");
  }

  downloadGpx(): string {
    return this.api("/download-service/export/gpx/activity/");
  }

  downloadTcx(): string {
    return this.api("/download-service/export/tcx/activity/");
  }

  downloadKml(): string {
    return this.api("/download-service/export/kml/activity/");
  }

  upload(): string {
    return this.api("/upload-service/upload/");
  }

  importData(): string {
    return this.api("/modern/import-data");
  }

  // ── Wellness ─────────────────────────────────────────────────

  dailySteps(): string {
    return this.api("/usersummary-service/stats/steps/daily/");
  }

  dailySleep(): string {
    return this.api("/sleep-service/sleep/dailySleepData");
  }

  dailyWeight(): string {
    return this.api("/weight-service/weight/dayview");
  }

  updateWeight(): string {
    return this.api("/weight-service/user-weight");
  }

  dailyHydration(): string {
    return this.api("/usersummary-service/usersummary/hydration/allData");
  }

  hydrationLog(): string {
    return this.api("/usersummary-service/usersummary/hydration/log");
  }

  dailyHeartRate(): string {
    return this.api("/wellness-service/wellness/dailyHeartRate");
  }

  hrv(date: string): string {
    return this.api(`/hrv-service/hrv/${date}`);
  }

  // ── Golf ─────────────────────────────────────────────────────

  golfScorecardSummary(): string {
    return this.api("/gcs-golfcommunity/api/v2/scorecard/summary");
  }

  golfScorecardDetail(): string {
    return this.api("/gcs-golfcommunity/api/v2/scorecard/detail");
  }

  // ── Workouts ─────────────────────────────────────────────────

  workout(id?: string): string {
    return id ? this.api(`/workout-service/workout/${id}`) : this.api("/workout-service/workout");
  }

  workouts(): string {
    return this.api("/workout-service/workouts");
  }
}
