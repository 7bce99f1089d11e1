import { HttpClient } from "../common/http.js";
import { matches, sameName } from "../common/match.js";
import {
  unwrapResponse,
  expectArray,
  type HttpOutcome,
} from "../common/response.js";
import {
  FindError,
  silentLogger,
  type FindErrorKind,
  type Logger,
} from "../common/types.js";
import { resolveZone, type Period } from "../period/period.js";
import {
  decodeGroups,
  decodeTeachers,
  decodeLectureRooms,
  decodeLectures,
} from "./decode.js";
import type {
  Group,
  Teacher,
  LectureRoom,
  Lecture,
  ScheduleRequest,
  ResourceType,
  ScheduleClientOptions,
} from "./types.js";

export const DEFAULT_BASE_URL = "https://api.mindenit.tech";

function resource(request: ScheduleRequest): [ResourceType, number] {
  switch (request.kind) {
    case "group":
      return ["groups", request.group.id];
    case "teacher":
      return ["teachers", request.teacher.id];
    case "lectureRoom":
      return ["auditories", request.lectureRoom.id];
  }
}

function findAll<T>(
  items: T[],
  name: string,
  field: (item: T) => string,
  kind: FindErrorKind,
): T[] {
  const found = items.filter((item) => matches(name, field(item)));
  if (found.length === 0) throw new FindError(kind, name);
  return found;
}

function findExact<T>(
  items: T[],
  name: string,
  field: (item: T) => string,
  kind: FindErrorKind,
): T {
  const found = items.find((item) => sameName(name, field(item)));
  if (found === undefined) throw new FindError(kind, name);
  return found;
}

export class ScheduleClient {
  private http: HttpClient;
  private baseUrl: string;
  private zone: string;
  private logger: Logger;

  constructor(opts?: ScheduleClientOptions) {
    this.http = new HttpClient({ dispatcher: opts?.dispatcher });
    this.baseUrl = (opts?.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
    this.zone = resolveZone(opts?.zone);
    this.logger = opts?.logger ?? silentLogger;
  }

  private async getList(path: string): Promise<unknown[]> {
    const url = `${this.baseUrl}${path}`;
    this.logger.debug(`GET ${url}`);

    let outcome: HttpOutcome;
    try {
      const res = await this.http.get(url);
      outcome = { kind: "response", ...res };
    } catch (error) {
      outcome = { kind: "failure", error };
    }
    if (outcome.kind === "response") {
      this.logger.debug(`GET ${url} -> ${outcome.status}`);
    }

    return expectArray(unwrapResponse(outcome));
  }

  private warnSkipped(path: string, received: number, decoded: number): void {
    if (decoded < received) {
      this.logger.warn(
        `${path}: skipped ${received - decoded} element(s) that are not objects`,
      );
    }
  }

  // --- Groups ---

  async getGroups(): Promise<Group[]> {
    const items = await this.getList("/lists/groups");
    const groups = decodeGroups(items);
    this.warnSkipped("/lists/groups", items.length, groups.length);
    return groups;
  }

  /** Groups whose name matches `name` as a case-insensitive RegExp. */
  async findGroup(opts: { name: string }): Promise<Group[]> {
    const groups = await this.getGroups();
    return findAll(groups, opts.name, (g) => g.name, "InvalidGroupName");
  }

  async findExactGroup(opts: { name: string }): Promise<Group> {
    const groups = await this.getGroups();
    return findExact(groups, opts.name, (g) => g.name, "InvalidGroupName");
  }

  // --- Teachers ---

  async getTeachers(): Promise<Teacher[]> {
    const items = await this.getList("/teachers");
    const teachers = decodeTeachers(items);
    this.warnSkipped("/teachers", items.length, teachers.length);
    return teachers;
  }

  /** Searches full names, e.g. "Новіков". */
  async findTeacher(opts: { name: string }): Promise<Teacher[]> {
    const teachers = await this.getTeachers();
    return findAll(
      teachers,
      opts.name,
      (t) => t.fullName,
      "InvalidTeacherName",
    );
  }

  /** Compares short names, e.g. "Терещенко Г. Ю.". */
  async findExactTeacher(opts: { name: string }): Promise<Teacher> {
    const teachers = await this.getTeachers();
    return findExact(
      teachers,
      opts.name,
      (t) => t.shortName,
      "InvalidTeacherName",
    );
  }

  // --- Lecture rooms ---

  async getLectureRooms(): Promise<LectureRoom[]> {
    const items = await this.getList("/auditories");
    const rooms = decodeLectureRooms(items);
    this.warnSkipped("/auditories", items.length, rooms.length);
    return rooms;
  }

  async findLectureRoom(opts: { name: string }): Promise<LectureRoom[]> {
    const rooms = await this.getLectureRooms();
    return findAll(
      rooms,
      opts.name,
      (r) => r.name,
      "InvalidLectureRoomName",
    );
  }

  async findExactLectureRoom(opts: { name: string }): Promise<LectureRoom> {
    const rooms = await this.getLectureRooms();
    return findExact(
      rooms,
      opts.name,
      (r) => r.name,
      "InvalidLectureRoomName",
    );
  }

  // --- Schedule ---

  async getSchedule(opts: {
    request: ScheduleRequest;
    period: Period;
  }): Promise<Lecture[]> {
    const [type, id] = resource(opts.request);
    const query = new URLSearchParams({
      start: String(opts.period.startSeconds),
      end: String(opts.period.endSeconds),
    });
    const path = `/schedule/${type}/${id}`;
    const items = await this.getList(`${path}?${query.toString()}`);
    const lectures = decodeLectures(items, { zone: this.zone });
    this.warnSkipped(path, items.length, lectures.length);
    return lectures;
  }
}
