import type { Database } from "./db";
import {
  users,
  scanResults,
  breedCorrections,
  notifications,
  PredictionMethod,
  type User,
  type ScanResult,
  type InsertScanResult,
  type BreedCorrection,
  type InsertBreedCorrection,
  type Notification,
  type InsertNotification,
  type TeachingStatus,
} from "@shared/schema";
import { eq, desc, and, or, sql, notInArray, count } from "drizzle-orm";
import { trackApiCall } from "./monitoring";

// Breed and verification only change through a correction write
export type ScanResultPatch = Pick<ScanResult, 'simulationData'>;

export interface CorrectionWrite {
  correction: InsertBreedCorrection;
  // Null when the scan has no owner to notify
  notification: InsertNotification | null;
}

export interface CorrectionWriteResult {
  correction: BreedCorrection;
  scan: ScanResult;
  notification: Notification | null;
}

export interface IStorage {
  getUser(id: number): Promise<User | undefined>;

  // Scan records
  createScanResult(scan: InsertScanResult): Promise<ScanResult>;
  getScanResult(scanId: string): Promise<ScanResult | undefined>;
  getScanResults(userId: number | null, limit?: number): Promise<ScanResult[]>;
  getLatestScanByImageHash(imageHash: string): Promise<ScanResult | undefined>;
  updateScanResult(scanId: string, patch: ScanResultPatch): Promise<ScanResult | undefined>;
  deleteScanResult(scanId: string): Promise<boolean>;
  countScansReferencingPath(path: string): Promise<number>; // original image or either variant
  getUncorrectedScans(limit: number): Promise<ScanResult[]>;
  countUncorrectedScans(): Promise<number>;

  // Corrections
  getLatestCorrectionByImageHash(imageHash: string): Promise<BreedCorrection | undefined>;
  getCorrection(id: number): Promise<BreedCorrection | undefined>;
  getCorrections(): Promise<BreedCorrection[]>;
  countCorrections(): Promise<number>;
  applyCorrection(write: CorrectionWrite): Promise<CorrectionWriteResult | undefined>;
  updateCorrectionTeaching(id: number, status: TeachingStatus, message: string | null): Promise<BreedCorrection | undefined>;
  deleteCorrection(id: number): Promise<boolean>;

  // Notifications
  getNotifications(userId: number, limit?: number): Promise<Notification[]>;
  getUnreadNotificationCount(userId: number): Promise<number>;
  markNotificationRead(id: number, userId: number): Promise<Notification | undefined>;
  markAllNotificationsRead(userId: number): Promise<number>;
  deleteNotification(id: number, userId: number): Promise<boolean>;
}

export class DatabaseStorage implements IStorage {
  constructor(private readonly db: Database) {}

  async getUser(id: number): Promise<User | undefined> {
    const [user] = await this.db.select().from(users).where(eq(users.id, id));
    return user;
  }

  async createScanResult(scan: InsertScanResult): Promise<ScanResult> {
    return trackApiCall('database', async () => {
      const [created] = await this.db.insert(scanResults).values(scan).returning();
      return created;
    });
  }

  async getScanResult(scanId: string): Promise<ScanResult | undefined> {
    const [scan] = await this.db.select().from(scanResults).where(eq(scanResults.scanId, scanId));
    return scan;
  }

  async getScanResults(userId: number | null, limit = 50): Promise<ScanResult[]> {
    return this.db.select()
      .from(scanResults)
      .where(userId === null ? undefined : eq(scanResults.userId, userId))
      .orderBy(desc(scanResults.createdAt), desc(scanResults.id))
      .limit(limit);
  }

  async getLatestScanByImageHash(imageHash: string): Promise<ScanResult | undefined> {
    const [scan] = await this.db.select()
      .from(scanResults)
      .where(eq(scanResults.imageHash, imageHash))
      .orderBy(desc(scanResults.createdAt), desc(scanResults.id))
      .limit(1);
    return scan;
  }

  async updateScanResult(scanId: string, patch: ScanResultPatch): Promise<ScanResult | undefined> {
    return trackApiCall('database', async () => {
      const [updated] = await this.db.update(scanResults)
        .set({ ...patch, updatedAt: new Date() })
        .where(eq(scanResults.scanId, scanId))
        .returning();
      return updated;
    });
  }

  async deleteScanResult(scanId: string): Promise<boolean> {
    const deleted = await this.db.delete(scanResults)
      .where(eq(scanResults.scanId, scanId))
      .returning({ id: scanResults.id });
    return deleted.length > 0;
  }

  async countScansReferencingPath(path: string): Promise<number> {
    const [row] = await this.db.select({ value: count() })
      .from(scanResults)
      .where(or(
        eq(scanResults.imagePath, path),
        sql`${scanResults.simulationData}->>'1_years' = ${path}`,
        sql`${scanResults.simulationData}->>'3_years' = ${path}`,
      ));
    return row?.value ?? 0;
  }

  async getUncorrectedScans(limit: number): Promise<ScanResult[]> {
    return this.db.select()
      .from(scanResults)
      .where(notInArray(scanResults.scanId, this.db.select({ scanId: breedCorrections.scanId }).from(breedCorrections)))
      .orderBy(desc(scanResults.createdAt), desc(scanResults.id))
      .limit(limit);
  }

  async countUncorrectedScans(): Promise<number> {
    const [row] = await this.db.select({ value: count() })
      .from(scanResults)
      .where(notInArray(scanResults.scanId, this.db.select({ scanId: breedCorrections.scanId }).from(breedCorrections)));
    return row?.value ?? 0;
  }

  async getLatestCorrectionByImageHash(imageHash: string): Promise<BreedCorrection | undefined> {
    const [correction] = await this.db.select()
      .from(breedCorrections)
      .where(eq(breedCorrections.imageHash, imageHash))
      .orderBy(desc(breedCorrections.createdAt), desc(breedCorrections.id))
      .limit(1);
    return correction;
  }

  async getCorrection(id: number): Promise<BreedCorrection | undefined> {
    const [correction] = await this.db.select().from(breedCorrections).where(eq(breedCorrections.id, id));
    return correction;
  }

  async getCorrections(): Promise<BreedCorrection[]> {
    return this.db.select().from(breedCorrections).orderBy(desc(breedCorrections.createdAt), desc(breedCorrections.id));
  }

  async countCorrections(): Promise<number> {
    const [row] = await this.db.select({ value: count() }).from(breedCorrections);
    return row?.value ?? 0;
  }

  // Correction entry, verified scan and owner notification commit together
  async applyCorrection(write: CorrectionWrite): Promise<CorrectionWriteResult | undefined> {
    return trackApiCall('database', () => this.db.transaction(async (tx) => {
      const [scan] = await tx.update(scanResults)
        .set({
          breed: write.correction.correctedBreed,
          confidence: 100,
          verificationStatus: 'verified',
          predictionMethod: PredictionMethod.ADMIN_CORRECTED,
          updatedAt: new Date(),
        })
        .where(eq(scanResults.scanId, write.correction.scanId))
        .returning();
      if (!scan) return undefined;

      const [correction] = await tx.insert(breedCorrections).values(write.correction).returning();

      let notification: Notification | null = null;
      if (write.notification) {
        [notification] = await tx.insert(notifications).values(write.notification).returning();
      }

      return { correction, scan, notification };
    }));
  }

  async updateCorrectionTeaching(id: number, status: TeachingStatus, message: string | null): Promise<BreedCorrection | undefined> {
    const [updated] = await this.db.update(breedCorrections)
      .set({ status, teachingMessage: message, updatedAt: new Date() })
      .where(eq(breedCorrections.id, id))
      .returning();
    return updated;
  }

  async deleteCorrection(id: number): Promise<boolean> {
    const deleted = await this.db.delete(breedCorrections)
      .where(eq(breedCorrections.id, id))
      .returning({ id: breedCorrections.id });
    return deleted.length > 0;
  }

  async getNotifications(userId: number, limit = 50): Promise<Notification[]> {
    return this.db.select()
      .from(notifications)
      .where(eq(notifications.userId, userId))
      .orderBy(desc(notifications.createdAt), desc(notifications.id))
      .limit(limit);
  }

  async getUnreadNotificationCount(userId: number): Promise<number> {
    const [row] = await this.db.select({ value: count() })
      .from(notifications)
      .where(and(eq(notifications.userId, userId), eq(notifications.read, false)));
    return row?.value ?? 0;
  }

  async markNotificationRead(id: number, userId: number): Promise<Notification | undefined> {
    const [updated] = await this.db.update(notifications)
      .set({ read: true, readAt: new Date() })
      .where(and(eq(notifications.id, id), eq(notifications.userId, userId)))
      .returning();
    return updated;
  }

  async markAllNotificationsRead(userId: number): Promise<number> {
    const updated = await this.db.update(notifications)
      .set({ read: true, readAt: new Date() })
      .where(and(eq(notifications.userId, userId), eq(notifications.read, false)))
      .returning({ id: notifications.id });
    return updated.length;
  }

  async deleteNotification(id: number, userId: number): Promise<boolean> {
    const deleted = await this.db.delete(notifications)
      .where(and(eq(notifications.id, id), eq(notifications.userId, userId)))
      .returning({ id: notifications.id });
    return deleted.length > 0;
  }
}
