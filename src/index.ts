export { ScheduleClient, DEFAULT_BASE_URL } from "./api/client.js";
export {
  decodeGroups,
  decodeTeachers,
  decodeLectureRooms,
  decodeSubject,
  decodeLectures,
  DEFAULT_SUBJECT,
} from "./api/decode.js";
export {
  Period,
  DEFAULT_ZONE,
  toTimestamp,
  fromTimestamp,
} from "./period/period.js";
export type { PeriodOptions } from "./period/period.js";
export { parseDateTime } from "./period/parse.js";
export { matches, sameName } from "./common/match.js";
export { unwrapResponse } from "./common/response.js";
export type { HttpOutcome } from "./common/response.js";
export { HttpClient } from "./common/http.js";
export type { HttpResponse } from "./common/http.js";
export {
  RequestError,
  FindError,
  ParseError,
  silentLogger,
} from "./common/types.js";
export type {
  RequestErrorKind,
  FindErrorKind,
  ParseErrorKind,
  Logger,
} from "./common/types.js";
export type {
  Group,
  Teacher,
  LectureRoom,
  Subject,
  Lecture,
  ScheduleRequest,
  ResourceType,
  ScheduleClientOptions,
} from "./api/types.js";
