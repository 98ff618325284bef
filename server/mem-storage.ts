import {
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
import type { CorrectionWrite, CorrectionWriteResult, IStorage, ScanResultPatch } from "./storage";

function newestFirst<T extends { id: number; createdAt: Date | null }>(a: T, b: T): number {
  const byTime = (b.createdAt?.getTime() ?? 0) - (a.createdAt?.getTime() ?? 0);
  return byTime !== 0 ? byTime : b.id - a.id;
}

/**
 * In-process IStorage used when no DATABASE_URL is configured and in tests.
 * Records are cloned on the way in and out so callers never share state with the store.
 */
export class MemStorage implements IStorage {
  private users = new Map<number, User>();
  private scans = new Map<string, ScanResult>();
  private corrections = new Map<number, BreedCorrection>();
  private notifications = new Map<number, Notification>();
  private nextScanId = 1;
  private nextCorrectionId = 1;
  private nextNotificationId = 1;

  constructor(private readonly clock: () => Date = () => new Date()) {}

  addUser(user: Pick<User, 'id' | 'username' | 'email'> & Partial<User>): User {
    const created: User = {
      isAdmin: false,
      createdAt: this.clock(),
      ...user,
    };
    this.users.set(created.id, created);
    return structuredClone(created);
  }

  async getUser(id: number): Promise<User | undefined> {
    const user = this.users.get(id);
    return user ? structuredClone(user) : undefined;
  }

  async createScanResult(scan: InsertScanResult): Promise<ScanResult> {
    const now = this.clock();
    const record: ScanResult = {
      id: this.nextScanId++,
      scanId: scan.scanId,
      userId: scan.userId ?? null,
      imagePath: scan.imagePath,
      imageHash: scan.imageHash,
      breed: scan.breed,
      confidence: scan.confidence,
      topPredictions: scan.topPredictions ?? [],
      verificationStatus: scan.verificationStatus ?? 'pending',
      predictionMethod: scan.predictionMethod ?? null,
      description: scan.description ?? null,
      originHistory: scan.originHistory ?? null,
      healthRisks: scan.healthRisks ?? null,
      simulationData: scan.simulationData,
      createdAt: scan.createdAt ?? now,
      updatedAt: scan.updatedAt ?? now,
    };
    if (this.scans.has(record.scanId)) {
      throw new Error(`duplicate key value violates unique constraint on scan_id ${record.scanId}`);
    }
    this.scans.set(record.scanId, structuredClone(record));
    return record;
  }

  async getScanResult(scanId: string): Promise<ScanResult | undefined> {
    const scan = this.scans.get(scanId);
    return scan ? structuredClone(scan) : undefined;
  }

  async getScanResults(userId: number | null, limit = 50): Promise<ScanResult[]> {
    return Array.from(this.scans.values())
      .filter(scan => userId === null || scan.userId === userId)
      .sort(newestFirst)
      .slice(0, limit)
      .map(scan => structuredClone(scan));
  }

  async getLatestScanByImageHash(imageHash: string): Promise<ScanResult | undefined> {
    const [latest] = Array.from(this.scans.values())
      .filter(scan => scan.imageHash === imageHash)
      .sort(newestFirst);
    return latest ? structuredClone(latest) : undefined;
  }

  async updateScanResult(scanId: string, patch: ScanResultPatch): Promise<ScanResult | undefined> {
    const existing = this.scans.get(scanId);
    if (!existing) return undefined;
    const updated: ScanResult = { ...existing, ...structuredClone(patch), updatedAt: this.clock() };
    this.scans.set(scanId, updated);
    return structuredClone(updated);
  }

  async deleteScanResult(scanId: string): Promise<boolean> {
    return this.scans.delete(scanId);
  }

  async countScansReferencingPath(path: string): Promise<number> {
    let total = 0;
    this.scans.forEach((scan) => {
      const sim = scan.simulationData;
      if (scan.imagePath === path || sim['1_years'] === path || sim['3_years'] === path) {
        total++;
      }
    });
    return total;
  }

  private uncorrected(): ScanResult[] {
    const corrected = new Set(Array.from(this.corrections.values()).map(c => c.scanId));
    return Array.from(this.scans.values()).filter(scan => !corrected.has(scan.scanId));
  }

  async getUncorrectedScans(limit: number): Promise<ScanResult[]> {
    return this.uncorrected()
      .sort(newestFirst)
      .slice(0, limit)
      .map(scan => structuredClone(scan));
  }

  async countUncorrectedScans(): Promise<number> {
    return this.uncorrected().length;
  }

  async getLatestCorrectionByImageHash(imageHash: string): Promise<BreedCorrection | undefined> {
    const [latest] = Array.from(this.corrections.values())
      .filter(correction => correction.imageHash === imageHash)
      .sort(newestFirst);
    return latest ? structuredClone(latest) : undefined;
  }

  async getCorrection(id: number): Promise<BreedCorrection | undefined> {
    const correction = this.corrections.get(id);
    return correction ? structuredClone(correction) : undefined;
  }

  async getCorrections(): Promise<BreedCorrection[]> {
    return Array.from(this.corrections.values())
      .sort(newestFirst)
      .map(correction => structuredClone(correction));
  }

  async countCorrections(): Promise<number> {
    return this.corrections.size;
  }

  private insertCorrection(input: InsertBreedCorrection): BreedCorrection {
    const now = this.clock();
    const correction: BreedCorrection = {
      id: this.nextCorrectionId++,
      scanId: input.scanId,
      imagePath: input.imagePath,
      imageHash: input.imageHash,
      originalBreed: input.originalBreed,
      correctedBreed: input.correctedBreed,
      confidence: input.confidence,
      status: input.status ?? 'pending',
      teachingMessage: input.teachingMessage ?? null,
      createdAt: now,
      updatedAt: now,
    };
    this.corrections.set(correction.id, correction);
    return correction;
  }

  private insertNotification(input: InsertNotification): Notification {
    const notification: Notification = {
      id: this.nextNotificationId++,
      userId: input.userId,
      type: input.type,
      title: input.title,
      message: input.message,
      data: input.data ?? null,
      read: false,
      readAt: null,
      createdAt: this.clock(),
    };
    this.notifications.set(notification.id, notification);
    return notification;
  }

  async applyCorrection(write: CorrectionWrite): Promise<CorrectionWriteResult | undefined> {
    const existing = this.scans.get(write.correction.scanId);
    if (!existing) return undefined;

    const scan: ScanResult = {
      ...existing,
      breed: write.correction.correctedBreed,
      confidence: 100,
      verificationStatus: 'verified',
      predictionMethod: PredictionMethod.ADMIN_CORRECTED,
      updatedAt: this.clock(),
    };
    this.scans.set(scan.scanId, scan);
    const correction = this.insertCorrection(write.correction);
    const notification = write.notification ? this.insertNotification(write.notification) : null;

    return {
      correction: structuredClone(correction),
      scan: structuredClone(scan),
      notification: notification ? structuredClone(notification) : null,
    };
  }

  async updateCorrectionTeaching(id: number, status: TeachingStatus, message: string | null): Promise<BreedCorrection | undefined> {
    const existing = this.corrections.get(id);
    if (!existing) return undefined;
    const updated: BreedCorrection = { ...existing, status, teachingMessage: message, updatedAt: this.clock() };
    this.corrections.set(id, updated);
    return structuredClone(updated);
  }

  async deleteCorrection(id: number): Promise<boolean> {
    return this.corrections.delete(id);
  }

  async getNotifications(userId: number, limit = 50): Promise<Notification[]> {
    return Array.from(this.notifications.values())
      .filter(notification => notification.userId === userId)
      .sort(newestFirst)
      .slice(0, limit)
      .map(notification => structuredClone(notification));
  }

  async getUnreadNotificationCount(userId: number): Promise<number> {
    return Array.from(this.notifications.values())
      .filter(notification => notification.userId === userId && !notification.read)
      .length;
  }

  async markNotificationRead(id: number, userId: number): Promise<Notification | undefined> {
    const existing = this.notifications.get(id);
    if (!existing || existing.userId !== userId) return undefined;
    const updated: Notification = { ...existing, read: true, readAt: this.clock() };
    this.notifications.set(id, updated);
    return structuredClone(updated);
  }

  async markAllNotificationsRead(userId: number): Promise<number> {
    let changed = 0;
    this.notifications.forEach((notification, id) => {
      if (notification.userId === userId && !notification.read) {
        this.notifications.set(id, { ...notification, read: true, readAt: this.clock() });
        changed++;
      }
    });
    return changed;
  }

  async deleteNotification(id: number, userId: number): Promise<boolean> {
    const existing = this.notifications.get(id);
    if (!existing || existing.userId !== userId) return false;
    return this.notifications.delete(id);
  }
}
