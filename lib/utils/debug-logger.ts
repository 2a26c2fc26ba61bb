/**
 * Debug Logger - structured restoration diagnostics
 */

const DEBUG_LOGGING_ENABLED = ['true', '1', 'on', 'yes'].includes(
  (process.env.NEXT_PUBLIC_DEBUG_LOGGING ?? '').toLowerCase()
);
const DEBUG_OVERRIDE_STORAGE_KEY = 'state-restoration:debug-logging';
const RUNTIME_PREF_CACHE_MS = 1000;
const RATE_LIMIT_INTERVAL_MS = 1000;
const RATE_LIMIT_MAX =
  Number(process.env.NEXT_PUBLIC_DEBUG_LOG_MAX ?? '') > 0
    ? Number(process.env.NEXT_PUBLIC_DEBUG_LOG_MAX)
    : 40; // ~40 logs/sec default before suppressing

const parseOverride = (value: unknown): boolean | null => {
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value !== 'string') {
    return null;
  }
  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'on', 'yes', 'enable', 'enabled'].includes(normalized)) {
    return true;
  }
  if (['false', '0', 'off', 'no', 'disable', 'disabled'].includes(normalized)) {
    return false;
  }
  return null;
};

let cachedPreference = DEBUG_LOGGING_ENABLED;
let lastPreferenceCheck = 0;

const computeRuntimePreference = (): boolean => {
  if (typeof window === 'undefined') {
    return DEBUG_LOGGING_ENABLED;
  }

  const globalOverride = parseOverride(
    Reflect.get(window, '__STATE_RESTORATION_DEBUG_LOGGING_OVERRIDE'),
  );
  if (globalOverride !== null) {
    return globalOverride;
  }

  try {
    const stored = window.localStorage.getItem(DEBUG_OVERRIDE_STORAGE_KEY);
    const storedOverride = parseOverride(stored);
    if (storedOverride !== null) {
      return storedOverride;
    }
  } catch {
    // Ignore storage errors; fall back to default
  }

  return DEBUG_LOGGING_ENABLED;
};

export const isDebugEnabled = () => {
  if (typeof window === 'undefined') {
    return DEBUG_LOGGING_ENABLED;
  }
  const now = Date.now();
  if (now - lastPreferenceCheck > RUNTIME_PREF_CACHE_MS) {
    cachedPreference = computeRuntimePreference();
    lastPreferenceCheck = now;
  }
  return cachedPreference;
};

let rateWindowStart = 0;
let rateWindowCount = 0;
let rateLimitWarned = false;

const shouldEmitDebugLog = () => {
  if (!isDebugEnabled()) {
    return false;
  }

  if (RATE_LIMIT_MAX <= 0) {
    return true;
  }

  const now = Date.now();
  if (now - rateWindowStart > RATE_LIMIT_INTERVAL_MS) {
    rateWindowStart = now;
    rateWindowCount = 0;
    rateLimitWarned = false;
  }

  if (rateWindowCount >= RATE_LIMIT_MAX) {
    if (!rateLimitWarned && typeof console !== 'undefined') {
      console.warn(
        `[DebugLogger] Suppressing debug logs after ${RATE_LIMIT_MAX} events/sec. ` +
          `Set localStorage("${DEBUG_OVERRIDE_STORAGE_KEY}","on") or raise NEXT_PUBLIC_DEBUG_LOG_MAX to re-enable.`,
      );
      rateLimitWarned = true;
    }
    return false;
  }

  rateWindowCount += 1;
  return true;
};

let sessionId: string | null = null;

// Generate or get session ID
function getSessionId(): string {
  if (!sessionId) {
    sessionId = `session-${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;
  }
  return sessionId;
}

export interface DebugLogData {
  component: string;
  action: string;
  content_preview?: string;
  metadata?: Record<string, unknown>;
}

export interface DebugLogEntry extends DebugLogData {
  session_id: string;
  timestamp: string;
}

export type DebugLogSink = (entry: DebugLogEntry) => void | Promise<void>;

const consoleSink: DebugLogSink = (entry) => {
  console.log(`[DEBUG ${entry.component}] ${entry.action}:`, entry.metadata ?? {});
};

let sink: DebugLogSink = consoleSink;

/**
 * Route debug entries somewhere other than the console (an API route, a
 * devtools panel). Pass null to restore the console sink.
 */
export function setDebugLogSink(next: DebugLogSink | null): void {
  sink = next ?? consoleSink;
}

/**
 * Log debug information.
 * Supports both object format and the 3-parameter format.
 */
export async function debugLog(
  dataOrContext: DebugLogData | string,
  event?: string,
  details?: Record<string, unknown>
): Promise<void> {
  // Early return if debug logging is disabled or rate-limited
  if (!shouldEmitDebugLog()) {
    return;
  }

  const logData: DebugLogData =
    typeof dataOrContext === 'string'
      ? { component: dataOrContext, action: event || 'unknown', metadata: details }
      : dataOrContext;

  try {
    await sink({
      ...logData,
      session_id: getSessionId(),
      timestamp: new Date().toISOString(),
    });
  } catch (error) {
    // Fallback to console if the sink fails
    console.log('[DEBUG]', logData, error);
  }
}

/**
 * Log a bucket lifecycle transition
 */
export async function logBucketEvent(
  action: 'claim' | 'adopt' | 'rename' | 'dispose' | 'toggle',
  restorationId: string | null,
  metadata: Record<string, unknown> = {}
): Promise<void> {
  await debugLog({
    component: 'StateRestoration',
    action,
    content_preview: `Bucket ${action} for ${restorationId ?? '<none>'}`,
    metadata: {
      restorationId,
      ...metadata,
    },
  });
}
