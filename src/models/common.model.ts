export type Timestamp = string; // ISO 8601

export type DayKey = string; // YYYY-MM-DD in a named time zone
