import { randomUUID } from "node:crypto";
import { openTimeLogDB, type TimeLogDatabase } from "../lib/db";
import * as orderRepository from "../lib/repositories/orderRepository";
import * as teamRepository from "../lib/repositories/teamRepository";
import * as userRepository from "../lib/repositories/userRepository";
import type { Clock } from "../lib/utils/time";
import type { TimeLog, TimeLogDraft } from "../types";

/** A clock tests can move. */
export function testClock(start: string): Clock & { set(iso: string): void } {
  let current = new Date(start);
  const clock = () => new Date(current.getTime());
  return Object.assign(clock, {
    set(iso: string) {
      current = new Date(iso);
    },
  });
}

/** Fresh database per test: fake-indexeddb keeps every name in memory. */
export function openTestDB(): Promise<TimeLogDatabase> {
  return openTimeLogDB(`test-${randomUUID()}`);
}

/**
 * Two organisations:
 * - org-1: admin-1, lead-1 (sales, leads team-1), sales-2 (sales, leads nothing),
 *   worker-1 (active in team-1), worker-2 (inactive in team-1, rate 500)
 * - org-2: admin-2, worker-3
 * Orders order-1 and order-2 belong to org-1, order-3 to org-2.
 */
export async function seedOrganisations(db: TimeLogDatabase): Promise<void> {
  await userRepository.create(db, { id: "admin-1", role: "admin", organisationId: "org-1" });
  await userRepository.create(db, { id: "lead-1", role: "sales", organisationId: "org-1" });
  await userRepository.create(db, { id: "sales-2", role: "sales", organisationId: "org-1" });
  await userRepository.create(db, { id: "worker-1", role: "worker", organisationId: "org-1" });
  await userRepository.create(db, {
    id: "worker-2",
    role: "worker",
    organisationId: "org-1",
    hourlyRate: 500,
  });
  await userRepository.create(db, { id: "admin-2", role: "admin", organisationId: "org-2" });
  await userRepository.create(db, { id: "worker-3", role: "worker", organisationId: "org-2" });

  await orderRepository.create(db, { id: "order-1", organisationId: "org-1", title: "Roof repair" });
  await orderRepository.create(db, { id: "order-2", organisationId: "org-1", title: "Gutter check" });
  await orderRepository.create(db, { id: "order-3", organisationId: "org-2", title: null });

  await teamRepository.create(db, {
    id: "team-1",
    organisationId: "org-1",
    teamLeaderId: "lead-1",
    name: "Roofers",
  });
  await teamRepository.addMember(db, "team-1", "worker-1");
  await teamRepository.addMember(db, "team-1", "worker-2", false);
}

export function makeDraft(overrides: Partial<TimeLogDraft> = {}): TimeLogDraft {
  return {
    orderId: "order-1",
    userId: "worker-1",
    startTime: "2025-03-10T09:00:00Z",
    endTime: null,
    breakDurationMinutes: 0,
    notes: null,
    isApproved: false,
    hourlyRate: 650,
    locationLat: null,
    locationLng: null,
    photoUrls: [],
    materialsUsed: [],
    travelTimeMinutes: 0,
    workType: null,
    weatherConditions: null,
    ...overrides,
  };
}

export function makeLog(overrides: Partial<TimeLog> = {}): TimeLog {
  return {
    ...makeDraft(),
    id: "log-1",
    totalAmount: 0,
    createdAt: "2025-03-10T09:00:00Z",
    updatedAt: "2025-03-10T09:00:00Z",
    ...overrides,
  };
}
