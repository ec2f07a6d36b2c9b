/**
 * Per-stage result type for the analyzers
 *
 * - ok:          analysis ran and produced a value
 * - empty:       analysis ran but nothing qualified (e.g. no samples in the window)
 * - unavailable: analysis could not run because its input was never resolvable
 * - failed:      analysis threw; the reason is kept so a broken stage is visible
 */

export type StageResult<T> =
  | { status: "ok"; value: T }
  | { status: "empty"; reason: string }
  | { status: "unavailable"; reason: string }
  | { status: "failed"; reason: string };

export type StageStatus = StageResult<unknown>["status"];

export function ok<T>(value: T): StageResult<T> {
  return { status: "ok", value };
}

export function empty(reason: string): StageResult<never> {
  return { status: "empty", reason };
}

export function unavailable(reason: string): StageResult<never> {
  return { status: "unavailable", reason };
}

/**
 * Run one analyzer, converting a thrown error into a failed stage so the
 * remaining analyzers still produce their results
 */
export function runStage<T>(name: string, analyze: () => StageResult<T>): StageResult<T> {
  try {
    return analyze();
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    console.error(`[analysis] ${name} stage failed: ${reason}`);
    return { status: "failed", reason };
  }
}

export function stageValue<T>(result: StageResult<T>): T | undefined {
  return result.status === "ok" ? result.value : undefined;
}
