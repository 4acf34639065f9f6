import type { TimeLogDatabase } from "../db";
import { NotFoundError } from "../errors";
import type { Order } from "../../types";

export async function create(db: TimeLogDatabase, order: Order): Promise<Order> {
  await db.add("orders", order);
  return order;
}

export async function getById(db: TimeLogDatabase, id: string): Promise<Order | undefined> {
  return db.get("orders", id);
}

/**
 * Atomically delete an order and every time log recorded against it
 * (ON DELETE CASCADE).
 *
 * @returns the number of time logs removed
 */
export async function remove(db: TimeLogDatabase, id: string): Promise<number> {
  const tx = db.transaction(["orders", "timeLogs"], "readwrite");

  const existing = await tx.objectStore("orders").get(id);
  if (!existing) {
    throw new NotFoundError(`Order not found: ${id}`);
  }

  const logStore = tx.objectStore("timeLogs");
  const logIds = await logStore.index("by-orderId").getAllKeys(id);

  await Promise.all([
    ...logIds.map((logId) => logStore.delete(logId)),
    tx.objectStore("orders").delete(id),
    tx.done,
  ]);

  return logIds.length;
}
