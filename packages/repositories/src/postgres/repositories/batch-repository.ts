import { asc, eq, inArray } from 'drizzle-orm';
import { sameOrderLine, type Batch, type BatchReference, type OrderLine } from '@allocation/domain';
import type { Database } from '../db.js';
import { batches, allocations } from '../schema/index.js';
import type { TrackingBatchRepository } from '../../interfaces/index.js';

/**
 * Batch repository over the `batches` and `allocations` tables.
 *
 * Acts as an identity map for the scope it was built for: every batch it
 * returns or adds is tracked, repeated lookups return the same object, and
 * flush() writes back the tracked batches that changed since they were
 * loaded. Build one per transaction.
 */
export class PgBatchRepository implements TrackingBatchRepository {
  private readonly seen = new Map<BatchReference, Batch>();
  private readonly snapshots = new Map<BatchReference, Batch>();

  constructor(private db: Database) {}

  async add(batch: Batch): Promise<void> {
    await this.db.insert(batches).values({
      reference: batch.reference,
      sku: batch.sku,
      purchasedQuantity: batch.purchasedQuantity,
      eta: batch.eta ? new Date(batch.eta) : null,
    });

    await this.insertAllocations(batch.reference, batch.allocations);
    this.track(batch);
  }

  async get(reference: BatchReference): Promise<Batch | null> {
    const tracked = this.seen.get(reference);
    if (tracked) return tracked;

    const [row] = await this.db.select().from(batches).where(eq(batches.reference, reference));
    if (!row) return null;

    const [batch] = await this.hydrate([row]);
    return batch ?? null;
  }

  async list(): Promise<Batch[]> {
    const rows = await this.db.select().from(batches).orderBy(asc(batches.reference));
    return this.hydrate(rows);
  }

  /**
   * Write changed batches back: scalar columns are updated and the
   * allocation set is replaced. Batches that were only read are left alone.
   */
  async flush(): Promise<void> {
    for (const batch of this.seen.values()) {
      const snapshot = this.snapshots.get(batch.reference);
      if (snapshot && !hasBatchChanged(snapshot, batch)) continue;

      await this.db
        .update(batches)
        .set({
          purchasedQuantity: batch.purchasedQuantity,
          eta: batch.eta ? new Date(batch.eta) : null,
        })
        .where(eq(batches.reference, batch.reference));

      await this.db.delete(allocations).where(eq(allocations.batchReference, batch.reference));
      await this.insertAllocations(batch.reference, batch.allocations);
      this.snapshots.set(batch.reference, structuredClone(batch));
    }
  }

  private track(batch: Batch): void {
    this.seen.set(batch.reference, batch);
    this.snapshots.set(batch.reference, structuredClone(batch));
  }

  private async insertAllocations(reference: BatchReference, lines: OrderLine[]): Promise<void> {
    if (lines.length === 0) return;

    await this.db.insert(allocations).values(
      lines.map((line) => ({
        batchReference: reference,
        orderId: line.orderId,
        sku: line.sku,
        quantity: line.quantity,
      }))
    );
  }

  /**
   * Turn batch rows into tracked Batch objects, loading allocations for the
   * untracked ones in a single query.
   */
  private async hydrate(rows: Array<typeof batches.$inferSelect>): Promise<Batch[]> {
    const untracked = rows.filter((row) => !this.seen.has(row.reference));

    const linesByBatch = new Map<BatchReference, OrderLine[]>();
    if (untracked.length > 0) {
      const allocationRows = await this.db
        .select()
        .from(allocations)
        .where(
          inArray(
            allocations.batchReference,
            untracked.map((row) => row.reference)
          )
        )
        .orderBy(asc(allocations.id));

      for (const allocation of allocationRows) {
        const lines = linesByBatch.get(allocation.batchReference) ?? [];
        lines.push(this.rowToOrderLine(allocation));
        linesByBatch.set(allocation.batchReference, lines);
      }
    }

    return rows.map((row) => {
      const tracked = this.seen.get(row.reference);
      if (tracked) return tracked;

      const batch = this.rowToBatch(row, linesByBatch.get(row.reference) ?? []);
      this.track(batch);
      return batch;
    });
  }

  private rowToBatch(row: typeof batches.$inferSelect, lines: OrderLine[]): Batch {
    return {
      reference: row.reference,
      sku: row.sku,
      purchasedQuantity: row.purchasedQuantity,
      eta: row.eta?.toISOString() ?? null,
      allocations: lines,
    };
  }

  private rowToOrderLine(row: typeof allocations.$inferSelect): OrderLine {
    return {
      orderId: row.orderId,
      sku: row.sku,
      quantity: row.quantity,
    };
  }
}

/**
 * Whether `batch` differs from the state it was loaded in.
 */
export function hasBatchChanged(snapshot: Batch, batch: Batch): boolean {
  if (snapshot.purchasedQuantity !== batch.purchasedQuantity) return true;
  if (snapshot.eta !== batch.eta) return true;
  if (snapshot.allocations.length !== batch.allocations.length) return true;
  return snapshot.allocations.some((line, i) => {
    const current = batch.allocations[i];
    return !current || !sameOrderLine(line, current);
  });
}
