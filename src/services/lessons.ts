import { MemoryStoreLike, RunEventSink, SupervisedReport } from "../types";
import { errorMessage } from "../utils/text";

export const memoryQueryFor = (target: string): string =>
  `How to generate a driver for an API similar to ${target}? Patterns, auth, testing.`;

/** Store failures never abort a run; they only cost the hints. */
export const collectMemoryHints = async (
  memory: MemoryStoreLike | undefined,
  target: string,
  limit: number,
  events: RunEventSink
): Promise<string[]> => {
  if (!memory) return [];

  try {
    const hits = await memory.search(memoryQueryFor(target), limit);
    events.emit("memory", "memory_hints_loaded", `Loaded ${hits.length} lesson(s) from earlier runs.`, {
      data: { count: hits.length }
    });
    return hits.map((hit) => hit.text);
  } catch (error: unknown) {
    events.emit("memory", "memory_unavailable", `Memory store unavailable: ${errorMessage(error)}`);
    return [];
  }
};

export const extractLessons = (target: string, report: SupervisedReport): string[] => {
  const lessons: string[] = [];
  const records = report.attempts;

  records.forEach((record, index) => {
    if (record.outcome.kind !== "fail" || !record.diagnosis) return;
    const next = records[index + 1];
    const fixed = next?.outcome.kind === "pass";

    if (fixed && record.diagnosis.canFix) {
      lessons.push(
        `${target}: ${record.outcome.category} failure ("${record.outcome.message}") was fixed by: ${record.diagnosis.fixDescription}`
      );
    } else if (!record.diagnosis.canFix) {
      lessons.push(`${target}: gave up on ${record.outcome.category} failure. Root cause: ${record.diagnosis.rootCause}`);
    }
  });

  if (report.success) {
    lessons.push(
      `${target}: driver passed its tests after ${records.length} attempt(s) in supervisor attempt ${report.supervisorAttemptNumber}.`
    );
  } else {
    const last = records[records.length - 1];
    if (last?.outcome.kind === "fail") {
      lessons.push(`${target}: generation ended (${report.terminal}) on ${last.outcome.category} failure: ${last.outcome.message}`);
    }
  }

  return [...new Set(lessons)];
};

export const recordLessons = async (
  memory: MemoryStoreLike | undefined,
  target: string,
  report: SupervisedReport,
  events: RunEventSink
): Promise<number> => {
  if (!memory) return 0;

  const lessons = extractLessons(target, report);
  try {
    for (const text of lessons) {
      await memory.add({
        text,
        metadata: { target, category: "driver_generation", success: report.success }
      });
    }
    events.emit("memory", "lessons_recorded", `Recorded ${lessons.length} lesson(s).`, { data: { lessons } });
    return lessons.length;
  } catch (error: unknown) {
    events.emit("memory", "memory_unavailable", `Could not record lessons: ${errorMessage(error)}`);
    return 0;
  }
};
