import { z } from "zod";
import { Period } from "../period/period.js";
import type {
  Group,
  Teacher,
  LectureRoom,
  Subject,
  Lecture,
} from "./types.js";

// Absent or mis-typed fields fall back per record; nothing is carried over
// from the previous element.
const int = z.number().int().catch(0);
const str = z.string().catch("");

const GroupSchema = z.object({ id: int, name: str });

const TeacherSchema = z.object({ id: int, shortName: str, fullName: str });

const LectureRoomSchema = z.object({ id: int, name: str });

const SubjectSchema = z.object({ brief: str, id: int, title: str });

const LectureSchema = z.object({
  auditory: str,
  startTime: int,
  endTime: int,
  numberPair: z.number().int().min(0).max(255).catch(0),
  type: str,
  teachers: z.unknown(),
  groups: z.unknown(),
  subject: z.unknown(),
});

export const DEFAULT_SUBJECT: Readonly<Subject> = {
  brief: "",
  id: 0,
  title: "",
};

/** Decode every object in `value`; other elements are skipped. */
function decodeList<S extends z.ZodTypeAny>(
  value: unknown,
  schema: S,
): z.output<S>[] {
  if (!Array.isArray(value)) return [];
  const result: z.output<S>[] = [];
  for (const item of value) {
    const parsed = schema.safeParse(item);
    if (parsed.success) result.push(parsed.data);
  }
  return result;
}

export function decodeGroups(value: unknown): Group[] {
  return decodeList(value, GroupSchema);
}

export function decodeTeachers(value: unknown): Teacher[] {
  return decodeList(value, TeacherSchema);
}

export function decodeLectureRooms(value: unknown): LectureRoom[] {
  return decodeList(value, LectureRoomSchema);
}

/** Anything that is not a JSON object decodes to {@link DEFAULT_SUBJECT}. */
export function decodeSubject(value: unknown): Subject {
  const parsed = SubjectSchema.safeParse(value);
  return parsed.success ? parsed.data : { ...DEFAULT_SUBJECT };
}

/**
 * Decode schedule entries. `startTime`/`endTime` are epoch seconds and become
 * a {@link Period} in `zone`.
 *
 * @throws ParseError when a timestamp is out of range.
 */
export function decodeLectures(
  value: unknown,
  opts?: { zone?: string },
): Lecture[] {
  return decodeList(value, LectureSchema).map((raw) => ({
    room: raw.auditory,
    period: Period.fromTimestamps(raw.startTime, raw.endTime, opts),
    pairNumber: raw.numberPair,
    type: raw.type,
    teachers: decodeTeachers(raw.teachers),
    groups: decodeGroups(raw.groups),
    subject: decodeSubject(raw.subject),
  }));
}
