export { type Timestamp, toTimestamp, toDate } from "./timestamp";
