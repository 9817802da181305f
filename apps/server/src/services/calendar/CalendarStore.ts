import { randomUUID } from "node:crypto";
import type { BusinessRules } from "../../config/businessRules.js";
import { findAvailableSlots } from "../booking/slotFinder.js";
import { checkBusinessHours } from "./businessHours.js";
import { localDateOf, overlaps } from "./clock.js";
import type {
  Appointment,
  AppointmentDraft,
  AppointmentReference,
  BusinessHoursCheck,
  Interval,
} from "./types.js";

const GENERIC_REFERENCES = new Set(["appointment", "appointments", "booking", "event", "one", "it"]);

function copyOf(appointment: Appointment): Appointment {
  return { ...appointment, start: new Date(appointment.start), end: new Date(appointment.end) };
}

/**
 * In-memory appointment book for a single session. Policy (business hours,
 * conflicts) is checked by callers before `add`; the store only records and
 * answers queries.
 */
export class CalendarStore {
  private appointments: Appointment[] = [];

  constructor(readonly rules: BusinessRules) {}

  checkBusinessHours(interval: Interval): BusinessHoursCheck {
    return checkBusinessHours(interval, this.rules);
  }

  findConflicts(interval: Interval, excludeId?: string): Appointment[] {
    return this.appointments.filter(
      (appointment) => appointment.id !== excludeId && overlaps(appointment, interval)
    );
  }

  isFree(interval: Interval, excludeId?: string): boolean {
    return this.checkBusinessHours(interval).valid && this.findConflicts(interval, excludeId).length === 0;
  }

  add(draft: AppointmentDraft): Appointment {
    const appointment: Appointment = { ...draft, id: randomUUID() };
    this.appointments.push(appointment);
    this.appointments.sort((a, b) => a.start.getTime() - b.start.getTime());
    return appointment;
  }

  remove(appointmentId: string): Appointment | null {
    const index = this.appointments.findIndex((appointment) => appointment.id === appointmentId);
    if (index === -1) return null;
    const [removed] = this.appointments.splice(index, 1);
    return removed;
  }

  get(appointmentId: string): Appointment | null {
    return this.appointments.find((appointment) => appointment.id === appointmentId) ?? null;
  }

  listAll(): Appointment[] {
    return this.appointments.map(copyOf);
  }

  getAvailableSlots(dateISO: string, durationMinutes: number): Interval[] {
    return findAvailableSlots({
      dateISO,
      durationMinutes,
      rules: this.rules,
      busyIntervals: this.appointments,
    });
  }

  /**
   * Title match is a case-insensitive substring test in either direction,
   * narrowed to `reference.date` when given. Only a missing or generic phrase
   * ("appointment", "it") matches every appointment in the pool; a specific
   * phrase that hits no title matches nothing.
   */
  findByReference(reference: AppointmentReference): Appointment[] {
    const phrase = reference.phrase?.trim().toLowerCase() ?? "";
    const pool = reference.date
      ? this.appointments.filter(
          (appointment) => localDateOf(appointment.start, this.rules.timeZone) === reference.date
        )
      : this.appointments;

    if (!phrase || GENERIC_REFERENCES.has(phrase)) return pool.map(copyOf);

    return pool
      .filter((appointment) => {
        const title = appointment.title.toLowerCase();
        return title.includes(phrase) || phrase.includes(title);
      })
      .map(copyOf);
  }
}
