interface GridPosition {
    panelIndex: number;
    offsetInPanel: number;
}

interface CalendarDay {
    month: number;
    day: number;
}

interface DayHeader {
    label: string;
    left: number;
    offset: number;
    calendarDay: CalendarDay | null;
}

/**
 * One event block of the timetable grid. Every field is a string so the
 * structure serializes to the week JSON as-is; empty means "not found".
 */
interface CaseEvent {
    raw: string;
    start: string;
    end: string;
    room: string;
    site: string;
    teacher: string;
    title: string;
}

/** Day label (e.g. "Lundi 15 septembre") to its events, in header order. */
type WeeklySchedule = Record<string, CaseEvent[]>;

interface ScheduledWeek {
    monday: Date;
    schedule: WeeklySchedule;
}

interface CasCredentials {
    username: string;
    password: string;
}

export type {
    CalendarDay,
    CasCredentials,
    CaseEvent,
    DayHeader,
    GridPosition,
    ScheduledWeek,
    WeeklySchedule,
};
