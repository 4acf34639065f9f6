import type { TimeLogDatabase } from "../lib/db";
import {
  ConflictError,
  NotFoundError,
  PermissionDeniedError,
  ValidationError,
} from "../lib/errors";
import { createLocalDirectory } from "../lib/repositories/directory";
import * as orderRepository from "../lib/repositories/orderRepository";
import * as teamRepository from "../lib/repositories/teamRepository";
import { createLocalTimeLogRepository } from "../lib/repositories/timeLogRepository";
import { createTimeLogService, type TimeLogService } from "../lib/services/timeLogService";
import { toLocalISO } from "../lib/utils/time";
import type { TimeLog } from "../types";
import { openTestDB, seedOrganisations, testClock } from "./fixtures";

describe("timeLogService", () => {
  let db: TimeLogDatabase;
  let service: TimeLogService;
  const clock = testClock("2025-03-10T18:00:00Z");

  beforeEach(async () => {
    clock.set("2025-03-10T18:00:00Z");
    db = await openTestDB();
    await seedOrganisations(db);
    service = createTimeLogService({
      repository: createLocalTimeLogRepository(db, clock),
      directory: createLocalDirectory(db),
      now: clock,
    });
  });

  afterEach(() => {
    db.close();
  });

  const fullDay = (userId: string, orderId = "order-1") =>
    service.createTimeLog(userId, {
      orderId,
      userId,
      startTime: "2025-03-10T09:00:00Z",
      endTime: "2025-03-10T17:00:00Z",
      breakDurationMinutes: 60,
      hourlyRate: 650,
    });

  describe("createTimeLog", () => {
    it("derives the total from the clock times", async () => {
      const log = await fullDay("worker-1");

      expect(log.totalAmount).toBe(4550);
      expect(log.isApproved).toBe(false);
      expect(log.travelTimeMinutes).toBe(0);
      expect(log.photoUrls).toEqual([]);
    });

    it("falls back to the worker's profile rate", async () => {
      const log = await service.createTimeLog("worker-2", {
        orderId: "order-1",
        userId: "worker-2",
        startTime: "2025-03-10T09:00:00Z",
      });

      expect(log.hourlyRate).toBe(500);
      expect(log.endTime).toBeNull();
      expect(log.totalAmount).toBe(0);
    });

    it("rounds the rate and coordinates to their column precision", async () => {
      const log = await service.createTimeLog("worker-1", {
        orderId: "order-1",
        userId: "worker-1",
        startTime: "2025-03-10T09:00:00Z",
        hourlyRate: 650.256,
        locationLat: 50.0880412,
        locationLng: 14.4207601,
      });

      expect(log.hourlyRate).toBe(650.26);
      expect(log.locationLat).toBe(50.088041);
      expect(log.locationLng).toBe(14.42076);
    });

    it("fills material defaults", async () => {
      const log = await service.createTimeLog("worker-1", {
        orderId: "order-1",
        userId: "worker-1",
        startTime: "2025-03-10T09:00:00Z",
        materialsUsed: [{ name: "Sealant", quantity: 1 }],
      });

      expect(log.materialsUsed).toEqual([
        { name: "Sealant", quantity: 1, unit: null, unitPrice: null },
      ]);
    });

    it("refuses to create a log for someone else", async () => {
      await expect(
        service.createTimeLog("admin-1", {
          orderId: "order-1",
          userId: "worker-1",
          startTime: "2025-03-10T09:00:00Z",
        }),
      ).rejects.toThrow(PermissionDeniedError);
    });

    it("rejects a caller-supplied total", async () => {
      const input = {
        orderId: "order-1",
        userId: "worker-1",
        startTime: "2025-03-10T09:00:00Z",
        totalAmount: 100000,
      };

      await expect(service.createTimeLog("worker-1", input)).rejects.toThrow(ValidationError);
      expect(await service.listTimeLogs("worker-1")).toEqual([]);
    });

    it("rejects a negative break", async () => {
      await expect(
        service.createTimeLog("worker-1", {
          orderId: "order-1",
          userId: "worker-1",
          startTime: "2025-03-10T09:00:00Z",
          breakDurationMinutes: -5,
        }),
      ).rejects.toThrow("Invalid time log: breakDurationMinutes: Number must be greater than or equal to 0");
    });

    it("rejects an unknown actor", async () => {
      await expect(fullDay("ghost")).rejects.toThrow(PermissionDeniedError);
    });

    it("stores a negative total when the break exceeds the session", async () => {
      const log = await service.createTimeLog("worker-1", {
        orderId: "order-1",
        userId: "worker-1",
        startTime: "2025-03-10T09:00:00Z",
        endTime: "2025-03-10T10:00:00Z",
        breakDurationMinutes: 90,
        hourlyRate: 600,
      });

      expect(log.totalAmount).toBe(-300);
    });
  });

  describe("sessions", () => {
    it("starts now and stops later with the total filled in", async () => {
      clock.set("2025-03-10T08:00:00Z");
      const started = await service.startSession("worker-1", { orderId: "order-1", workType: "roofing" });

      expect(started.startTime).toBe(toLocalISO(new Date("2025-03-10T08:00:00Z")));
      expect(started.endTime).toBeNull();
      expect(started.hourlyRate).toBe(650);
      expect(started.totalAmount).toBe(0);

      clock.set("2025-03-10T12:00:00Z");
      const stopped = await service.stopSession("worker-1", started.id, { breakDurationMinutes: 30 });

      expect(stopped.endTime).toBe(toLocalISO(new Date("2025-03-10T12:00:00Z")));
      expect(stopped.totalAmount).toBe(2275);
      expect(stopped.workType).toBe("roofing");
    });

    it("refuses to stop a session twice", async () => {
      const started = await service.startSession("worker-1", { orderId: "order-1" });
      await service.stopSession("worker-1", started.id);

      await expect(service.stopSession("worker-1", started.id)).rejects.toThrow(ConflictError);
    });

    it("lets only one of two concurrent stops through", async () => {
      clock.set("2025-03-10T08:00:00Z");
      const started = await service.startSession("worker-1", { orderId: "order-1" });

      clock.set("2025-03-10T10:00:00Z");
      const results = await Promise.allSettled([
        service.stopSession("worker-1", started.id, { breakDurationMinutes: 0 }),
        service.stopSession("worker-1", started.id, { breakDurationMinutes: 120 }),
      ]);

      const stopped = results.flatMap((result) => (result.status === "fulfilled" ? [result.value] : []));
      const failures = results.flatMap((result) => (result.status === "rejected" ? [result.reason] : []));

      expect(stopped).toHaveLength(1);
      expect(failures).toHaveLength(1);
      expect(failures[0]).toBeInstanceOf(ConflictError);
      expect(await service.getTimeLog("worker-1", started.id)).toEqual(stopped[0]);
    });

    it("refuses to stop someone else's session", async () => {
      const started = await service.startSession("worker-1", { orderId: "order-1" });

      await expect(service.stopSession("admin-1", started.id)).rejects.toThrow(PermissionDeniedError);
    });
  });

  describe("getTimeLog", () => {
    let workerOneLog: TimeLog;
    let workerTwoLog: TimeLog;

    beforeEach(async () => {
      workerOneLog = await fullDay("worker-1");
      workerTwoLog = await fullDay("worker-2");
    });

    it.each(["worker-1", "admin-1", "lead-1"])("lets %s read an active team member's log", async (actor) => {
      expect(await service.getTimeLog(actor, workerOneLog.id)).toEqual(workerOneLog);
    });

    it.each(["worker-2", "sales-2", "admin-2", "worker-3"])("denies %s", async (actor) => {
      await expect(service.getTimeLog(actor, workerOneLog.id)).rejects.toThrow(PermissionDeniedError);
    });

    it("denies a team leader once the membership is inactive", async () => {
      await expect(service.getTimeLog("lead-1", workerTwoLog.id)).rejects.toThrow(PermissionDeniedError);

      await teamRepository.setMemberActive(db, "team-1", "worker-1", false);
      await expect(service.getTimeLog("lead-1", workerOneLog.id)).rejects.toThrow(PermissionDeniedError);
    });

    it("throws NotFoundError for a missing id", async () => {
      await expect(service.getTimeLog("admin-1", "missing")).rejects.toThrow(NotFoundError);
    });

    it("reports a cascaded log as missing", async () => {
      await orderRepository.remove(db, "order-1");
      await expect(service.getTimeLog("worker-1", workerOneLog.id)).rejects.toThrow(NotFoundError);
    });
  });

  describe("listTimeLogs", () => {
    beforeEach(async () => {
      await fullDay("worker-1");
      await fullDay("worker-1", "order-2");
      await fullDay("worker-2");
      await fullDay("worker-3", "order-3");
    });

    const ownersSeenBy = async (actor: string) =>
      (await service.listTimeLogs(actor)).map((log) => log.userId).sort();

    it("shows admins their whole organisation", async () => {
      expect(await ownersSeenBy("admin-1")).toEqual(["worker-1", "worker-1", "worker-2"]);
      expect(await ownersSeenBy("admin-2")).toEqual(["worker-3"]);
    });

    it("shows team leaders their active members only", async () => {
      expect(await ownersSeenBy("lead-1")).toEqual(["worker-1", "worker-1"]);
    });

    it("shows workers their own logs only", async () => {
      expect(await ownersSeenBy("worker-2")).toEqual(["worker-2"]);
      expect(await ownersSeenBy("sales-2")).toEqual([]);
    });

    it("applies the filter before the policy", async () => {
      const logs = await service.listTimeLogs("admin-1", { orderId: "order-2" });
      expect(logs.map((log) => log.userId)).toEqual(["worker-1"]);
    });

    it("rejects unknown filter keys", async () => {
      const filter = { orderId: "order-1", status: "open" };

      await expect(service.listTimeLogs("admin-1", filter)).rejects.toThrow(ValidationError);
    });
  });

  describe("updateTimeLog", () => {
    it("recomputes the total when the owner closes the session", async () => {
      const created = await service.createTimeLog("worker-1", {
        orderId: "order-1",
        userId: "worker-1",
        startTime: "2025-03-10T09:00:00Z",
      });

      const updated = await service.updateTimeLog("worker-1", created.id, {
        endTime: "2025-03-10T17:00:00Z",
        breakDurationMinutes: 60,
        notes: "Replaced flashing",
      });

      expect(updated.totalAmount).toBe(4550);
      expect(updated.notes).toBe("Replaced flashing");
    });

    it("does not let an admin edit work fields", async () => {
      const created = await fullDay("worker-1");

      await expect(
        service.updateTimeLog("admin-1", created.id, { hourlyRate: 1000 }),
      ).rejects.toThrow(PermissionDeniedError);
      expect((await service.getTimeLog("worker-1", created.id)).hourlyRate).toBe(650);
    });

    it("does not let the owner approve through an edit", async () => {
      const created = await fullDay("worker-1");

      const patch = { notes: "Done", isApproved: true };

      await expect(service.updateTimeLog("worker-1", created.id, patch)).rejects.toThrow(
        ValidationError,
      );
    });
  });

  describe("approveTimeLog", () => {
    it("lets an admin approve without touching the amount", async () => {
      const created = await fullDay("worker-1");

      clock.set("2025-03-11T07:00:00Z");
      const approved = await service.approveTimeLog("admin-1", created.id);

      expect(approved.isApproved).toBe(true);
      expect(approved.totalAmount).toBe(4550);
      expect(approved.updatedAt).toBe(toLocalISO(new Date("2025-03-11T07:00:00Z")));
    });

    it("lets a team leader approve and withdraw approval", async () => {
      const created = await fullDay("worker-1");

      expect((await service.approveTimeLog("lead-1", created.id)).isApproved).toBe(true);
      expect((await service.approveTimeLog("lead-1", created.id, false)).isApproved).toBe(false);
    });

    it.each(["worker-1", "worker-2", "sales-2", "admin-2"])("denies %s", async (actor) => {
      const created = await fullDay("worker-1");

      await expect(service.approveTimeLog(actor, created.id)).rejects.toThrow(PermissionDeniedError);
      expect((await service.getTimeLog("worker-1", created.id)).isApproved).toBe(false);
    });
  });

  describe("summarize", () => {
    it("summarizes what the actor can see", async () => {
      const first = await fullDay("worker-1");
      await fullDay("worker-2", "order-2");
      await fullDay("worker-3", "order-3");
      await service.approveTimeLog("admin-1", first.id);

      const { totals, byOrder } = await service.summarize("admin-1");

      expect(totals).toMatchObject({
        logCount: 2,
        workedMinutes: 840,
        totalAmount: 9100,
        approvedAmount: 4550,
        pendingAmount: 4550,
      });
      expect(byOrder.map((order) => order.orderId).sort()).toEqual(["order-1", "order-2"]);
    });
  });
});
