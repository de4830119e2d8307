import { parseDeadlineText } from '../dates/normalizer.js';
import { AssignmentRecord, RawAssignment } from '../types/index.js';
import { MissingStableIdError, RecordError } from '../utils/errors.js';
import { err, ok, Result } from '../utils/result.js';

const ASSIGNMENT_ID_PATTERN = /\/assignments\/(\d+)(?:[/?#]|$)/;

/**
 * Pulls the assignment id out of a link such as
 * https://quera.org/course/assignments/85830/problems
 */
export function extractStableId(link: string): string | null {
  const match = ASSIGNMENT_ID_PATTERN.exec(link);
  return match ? match[1] : null;
}

export function deriveStableId(link: string): Result<string, MissingStableIdError> {
  const stableId = extractStableId(link);
  if (!stableId) {
    return err({ code: 'MissingStableId', message: `Could not extract assignment ID from ${link || '(empty link)'}`, link });
  }
  return ok(stableId);
}

export function describeAssignment(link: string): string {
  return `Assignment Link: ${link}`;
}

export function buildAssignmentRecord(
  raw: RawAssignment,
  referenceNow: Date,
  utcOffsetMinutes: number
): Result<AssignmentRecord, RecordError> {
  const stableId = deriveStableId(raw.link);
  if (!stableId.ok) return stableId;

  const deadline = parseDeadlineText(raw.dateText, referenceNow, utcOffsetMinutes);
  if (!deadline.ok) return deadline;

  return ok({
    title: `${raw.title.trim()} | ${raw.course.trim()}`,
    stableId: stableId.value,
    dueInstant: deadline.value.dueInstant,
    windowStart: deadline.value.windowStart,
    sourceLink: raw.link,
    description: describeAssignment(raw.link),
  });
}
