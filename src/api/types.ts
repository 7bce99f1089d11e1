import type { Dispatcher } from "undici";
import type { Logger } from "../common/types.js";
import type { Period } from "../period/period.js";

export interface Group {
  id: number;
  name: string;
}

export interface Teacher {
  id: number;
  /** e.g. "Терещенко Г. Ю." */
  shortName: string;
  fullName: string;
}

export interface LectureRoom {
  id: number;
  name: string;
}

export interface Subject {
  /** Abbreviated title, e.g. "ОП". */
  brief: string;
  id: number;
  title: string;
}

export interface Lecture {
  room: string;
  period: Period;
  /** Ordinal of the class within the day (пара). */
  pairNumber: number;
  type: string;
  teachers: Teacher[];
  groups: Group[];
  subject: Subject;
}

/** What to fetch a schedule for. */
export type ScheduleRequest =
  | { kind: "group"; group: Group }
  | { kind: "teacher"; teacher: Teacher }
  | { kind: "lectureRoom"; lectureRoom: LectureRoom };

/** Path segment the API uses for each request kind. */
export type ResourceType = "groups" | "teachers" | "auditories";

export interface ScheduleClientOptions {
  /** API root, without a trailing slash. */
  baseUrl?: string;
  /** IANA zone for lecture periods. */
  zone?: string;
  /** undici dispatcher for requests; tests pass a `MockAgent`. */
  dispatcher?: Dispatcher;
  logger?: Logger;
}
