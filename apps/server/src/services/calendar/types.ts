export interface Interval {
  start: Date;
  end: Date;
}

export interface Appointment extends Interval {
  id: string;
  title: string;
  notes?: string;
}

export type AppointmentDraft = Omit<Appointment, "id">;

export type BusinessHoursViolation =
  | "outside-hours"
  | "crosses-lunch"
  | "weekend"
  | "holiday"
  | "starts-after-last-slot";

export type BusinessHoursCheck =
  | { valid: true }
  | { valid: false; reason: BusinessHoursViolation };

/** Locates an existing appointment from loose user wording. */
export interface AppointmentReference {
  phrase?: string;
  /** YYYY-MM-DD in the business time zone */
  date?: string;
}
