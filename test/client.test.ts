import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { MockAgent } from "undici";
import { ScheduleClient } from "../src/api/client.js";
import { FindError, RequestError } from "../src/common/types.js";
import { Period } from "../src/period/period.js";

const BASE = "https://api.test";

const GROUPS = [
  { id: 10, name: "ПЗПІ-23-2" },
  { id: 11, name: "ПЗПІ-23-3" },
  { id: 12, name: "КН-22-1" },
];

const TEACHERS = [
  { id: 5, shortName: "Терещенко Г. Ю.", fullName: "Терещенко Гліб Юрійович" },
  { id: 6, shortName: "Новіков О. В.", fullName: "Новіков Олег Вікторович" },
];

const ROOMS = [
  { id: 1, name: "287" },
  { id: 2, name: "філія-1" },
];

describe("ScheduleClient", () => {
  let agent: MockAgent;
  let client: ScheduleClient;

  function reply(path: string, status: number, body: unknown): void {
    agent
      .get(BASE)
      .intercept({ path, method: "GET" })
      .reply(status, typeof body === "string" ? body : JSON.stringify(body));
  }

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
    client = new ScheduleClient({ baseUrl: BASE, dispatcher: agent });
  });

  afterEach(async () => {
    await agent.close();
  });

  describe("groups", () => {
    it("lists all groups", async () => {
      reply("/lists/groups", 200, GROUPS);
      await expect(client.getGroups()).resolves.toEqual(GROUPS);
    });

    it("finds groups by pattern", async () => {
      reply("/lists/groups", 200, GROUPS);
      const found = await client.findGroup({ name: "пі-23" });
      expect(found.map((g) => g.id)).toEqual([10, 11]);
    });

    it("fails with InvalidGroupName when nothing matches", async () => {
      reply("/lists/groups", 200, GROUPS);
      const err = await client.findGroup({ name: "ФЛ-99" }).catch((e) => e);
      expect(err).toBeInstanceOf(FindError);
      expect(err).toMatchObject({ kind: "InvalidGroupName", input: "ФЛ-99" });
    });

    it("propagates an invalid pattern", async () => {
      reply("/lists/groups", 200, GROUPS);
      await expect(client.findGroup({ name: "(" })).rejects.toMatchObject({
        kind: "InvalidRegexString",
        input: "(",
      });
    });

    it("finds one group by exact name", async () => {
      reply("/lists/groups", 200, GROUPS);
      await expect(
        client.findExactGroup({ name: "пзпі-23-2" }),
      ).resolves.toEqual({ id: 10, name: "ПЗПІ-23-2" });
    });

    it("does not accept a partial name as exact", async () => {
      reply("/lists/groups", 200, GROUPS);
      await expect(
        client.findExactGroup({ name: "пзпі-23" }),
      ).rejects.toMatchObject({ kind: "InvalidGroupName", input: "пзпі-23" });
    });
  });

  describe("teachers", () => {
    it("searches full names", async () => {
      reply("/teachers", 200, TEACHERS);
      const found = await client.findTeacher({ name: "гліб" });
      expect(found).toEqual([TEACHERS[0]]);
    });

    it("matches exact lookups against short names", async () => {
      reply("/teachers", 200, TEACHERS);
      await expect(
        client.findExactTeacher({ name: "новіков о. в." }),
      ).resolves.toEqual(TEACHERS[1]);
    });

    it("does not match exact lookups against full names", async () => {
      reply("/teachers", 200, TEACHERS);
      await expect(
        client.findExactTeacher({ name: "Новіков Олег Вікторович" }),
      ).rejects.toMatchObject({ kind: "InvalidTeacherName" });
    });

    it("fails with InvalidTeacherName when nothing matches", async () => {
      reply("/teachers", 200, TEACHERS);
      await expect(client.findTeacher({ name: "Шевченко" })).rejects.toMatchObject({
        kind: "InvalidTeacherName",
        input: "Шевченко",
      });
    });
  });

  describe("lecture rooms", () => {
    it("lists and searches rooms", async () => {
      reply("/auditories", 200, ROOMS);
      await expect(client.getLectureRooms()).resolves.toEqual(ROOMS);
      reply("/auditories", 200, ROOMS);
      await expect(client.findLectureRoom({ name: "філія" })).resolves.toEqual([
        ROOMS[1],
      ]);
    });

    it("finds a room by exact name", async () => {
      reply("/auditories", 200, ROOMS);
      await expect(
        client.findExactLectureRoom({ name: "287" }),
      ).resolves.toEqual(ROOMS[0]);
    });

    it("fails with InvalidLectureRoomName when nothing matches", async () => {
      reply("/auditories", 200, ROOMS);
      await expect(client.findLectureRoom({ name: "999" })).rejects.toMatchObject({
        kind: "InvalidLectureRoomName",
        input: "999",
      });
    });
  });

  describe("schedule", () => {
    const period = Period.fromTimestamps(1704146400, 1704232799);
    const lecture = {
      auditory: "287",
      startTime: 1704182400,
      endTime: 1704188100,
      numberPair: 2,
      type: "Лк",
      teachers: [TEACHERS[0]],
      groups: [GROUPS[0]],
      subject: { brief: "ОП", id: 42, title: "Основи програмування" },
    };

    it("requests a group schedule for the period", async () => {
      reply("/schedule/groups/10?start=1704146400&end=1704232799", 200, [lecture]);
      const lectures = await client.getSchedule({
        request: { kind: "group", group: GROUPS[0] },
        period,
      });
      expect(lectures).toHaveLength(1);
      expect(lectures[0].room).toBe("287");
      expect(lectures[0].pairNumber).toBe(2);
      expect(lectures[0].subject.brief).toBe("ОП");
      expect(lectures[0].teachers).toEqual([TEACHERS[0]]);
      expect(lectures[0].period.start.toISO()).toBe(
        "2024-01-02T10:00:00.000+02:00",
      );
    });

    it("uses the teachers and auditories resources", async () => {
      reply("/schedule/teachers/5?start=1704146400&end=1704232799", 200, []);
      reply("/schedule/auditories/1?start=1704146400&end=1704232799", 200, []);
      await expect(
        client.getSchedule({
          request: { kind: "teacher", teacher: TEACHERS[0] },
          period,
        }),
      ).resolves.toEqual([]);
      await expect(
        client.getSchedule({
          request: { kind: "lectureRoom", lectureRoom: ROOMS[0] },
          period,
        }),
      ).resolves.toEqual([]);
    });
  });

  describe("failures", () => {
    it("surfaces a 404 as BadResponse", async () => {
      reply("/lists/groups", 404, "missing");
      const err = await client.getGroups().catch((e) => e);
      expect(err).toBeInstanceOf(RequestError);
      expect(err).toMatchObject({
        kind: "BadResponse",
        reason: "Not Found",
        status: 404,
      });
    });

    it("surfaces a transport error as GetFailed", async () => {
      agent
        .get(BASE)
        .intercept({ path: "/teachers", method: "GET" })
        .replyWithError(new Error("socket hang up"));
      await expect(client.getTeachers()).rejects.toMatchObject({
        kind: "GetFailed",
      });
    });

    it("rejects a body that is not JSON", async () => {
      reply("/auditories", 200, "<html>maintenance</html>");
      await expect(client.getLectureRooms()).rejects.toMatchObject({
        kind: "NotJson",
      });
    });

    it("rejects a top-level object", async () => {
      reply("/lists/groups", 200, { groups: GROUPS });
      await expect(client.getGroups()).rejects.toMatchObject({
        kind: "InvalidReturn",
      });
    });
  });

  describe("logging", () => {
    it("logs requests and skipped elements", async () => {
      const logger = { debug: vi.fn(), warn: vi.fn() };
      client = new ScheduleClient({ baseUrl: `${BASE}/`, dispatcher: agent, logger });
      reply("/teachers", 200, [TEACHERS[0], 5]);

      await expect(client.getTeachers()).resolves.toEqual([TEACHERS[0]]);
      expect(logger.debug).toHaveBeenCalledWith(`GET ${BASE}/teachers`);
      expect(logger.debug).toHaveBeenCalledWith(`GET ${BASE}/teachers -> 200`);
      expect(logger.warn).toHaveBeenCalledWith(
        "/teachers: skipped 1 element(s) that are not objects",
      );
    });
  });

  it("rejects an unknown zone up front", () => {
    expect(() => new ScheduleClient({ zone: "Nowhere/Town" })).toThrow(RangeError);
  });
});
