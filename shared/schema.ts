import { pgTable, text, serial, integer, boolean, timestamp, jsonb, doublePrecision, index, uniqueIndex } from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";

// ============ SCAN PIPELINE ENUMS ============

export const verificationStatuses = ['pending', 'verified'] as const;
export type VerificationStatus = typeof verificationStatuses[number];

// How the stored breed was reached. Values are persisted and read by clients.
export const PredictionMethod = {
  EXACT_MATCH: 'exact_match',
  ADMIN_CORRECTED: 'admin_corrected',
  CONFIRMED: 'ml_gemini_confirmed',
  OVERRIDE: 'gemini_override',
  HYBRID_OVERRIDE: 'gemini_hybrid_override',
  MODEL: 'model',
  MEMORY: 'memory',
} as const;
export type PredictionMethod = typeof PredictionMethod[keyof typeof PredictionMethod];

export const simulationStatuses = ['pending', 'queued', 'generating', 'complete', 'failed'] as const;
export type SimulationStatus = typeof simulationStatuses[number];

export const teachingStatuses = ['pending', 'added', 'updated', 'skipped', 'error'] as const;
export type TeachingStatus = typeof teachingStatuses[number];

// Identifier classification categories, in the order they are resolved
export const breedCategories = ['native_landrace', 'designer_hybrid', 'purebred', 'mixed'] as const;
export type BreedCategory = typeof breedCategories[number];

// ============ STRUCTURED BLOCKS ============

export interface BreedPrediction {
  breed: string;
  confidence: number;
}

export interface OriginHistory {
  summary?: string;
  region?: string;
  era?: string;
  originalPurpose?: string;
}

export interface HealthConcern {
  name: string;
  riskLevel: 'low' | 'moderate' | 'high';
  description?: string;
}

export interface HealthRisks {
  concerns: HealthConcern[];
  lifespan?: string;
  notes?: string;
}

export const estimatedAges = ['puppy', 'young adult', 'adult', 'mature', 'senior'] as const;
export type EstimatedAge = typeof estimatedAges[number];

export interface DogFeatures {
  coatColor?: string;
  coatPattern?: string;
  coatLength?: string;
  build?: string;
  estimatedAge?: EstimatedAge;
}

export const sizeCategories = ['toy', 'small', 'medium', 'large', 'giant'] as const;
export type SizeCategory = typeof sizeCategories[number];
export const bodyShapes = ['compact', 'athletic', 'stocky', 'elongated', 'slender', 'muscular'] as const;
export type BodyShape = typeof bodyShapes[number];
export const coatTypes = ['short', 'medium', 'long', 'double', 'curly', 'wire', 'hairless'] as const;
export type CoatType = typeof coatTypes[number];
export const grayingPatterns = ['early_muzzle', 'gradual', 'minimal', 'coat_fading'] as const;
export type GrayingPattern = typeof grayingPatterns[number];
export const growthCurves = ['rapid', 'moderate', 'minimal'] as const;
export type GrowthCurve = typeof growthCurves[number];

export const ageTargets = ['1_years', '3_years'] as const;
export type AgeTarget = typeof ageTargets[number];

export interface AgeNotes {
  body: string;
  face: string;
  size: string;
}

export interface BreedProfile {
  matchedRule: string;
  sizeCategory: SizeCategory;
  bodyShape: BodyShape;
  coatType: CoatType;
  grayingPattern: GrayingPattern;
  growthCurve: GrowthCurve;
  brachycephalic: boolean;
  growsSignificantly: boolean;
  faceTrait: string;
  notes: Record<AgeTarget, AgeNotes>;
}

export interface SimulationData {
  status: SimulationStatus;
  '1_years': string | null;
  '3_years': string | null;
  breed_profile: BreedProfile | null;
  dog_features?: DogFeatures;
  error: string | null;
}

export function emptySimulationData(status: SimulationStatus = 'pending'): SimulationData {
  return {
    status,
    '1_years': null,
    '3_years': null,
    breed_profile: null,
    error: null,
  };
}

// ============ TABLES ============

export const users = pgTable("users", {
  id: serial("id").primaryKey(),
  username: text("username").notNull().unique(),
  email: text("email").notNull().unique(),
  isAdmin: boolean("is_admin").notNull().default(false),
  createdAt: timestamp("created_at").defaultNow(),
});

export const scanResults = pgTable("scan_results", {
  id: serial("id").primaryKey(),
  scanId: text("scan_id").notNull(),
  userId: integer("user_id").references(() => users.id),
  imagePath: text("image_path").notNull(),
  imageHash: text("image_hash").notNull(), // sha256 hex of the uploaded bytes
  breed: text("breed").notNull(),
  confidence: doublePrecision("confidence").notNull(), // 0-100
  topPredictions: jsonb("top_predictions").$type<BreedPrediction[]>().notNull().default([]),
  verificationStatus: text("verification_status").$type<VerificationStatus>().notNull().default('pending'),
  predictionMethod: text("prediction_method").$type<PredictionMethod>(),
  description: text("description"),
  originHistory: jsonb("origin_history").$type<OriginHistory>(),
  healthRisks: jsonb("health_risks").$type<HealthRisks>(),
  simulationData: jsonb("simulation_data").$type<SimulationData>().notNull(),
  createdAt: timestamp("created_at").notNull().defaultNow(),
  updatedAt: timestamp("updated_at").notNull().defaultNow(),
}, (table) => ({
  scanIdUnique: uniqueIndex("scan_results_scan_id_idx").on(table.scanId),
  imageHashIdx: index("scan_results_image_hash_idx").on(table.imageHash),
  userIdx: index("scan_results_user_idx").on(table.userId),
}));

export const breedCorrections = pgTable("breed_corrections", {
  id: serial("id").primaryKey(),
  scanId: text("scan_id").notNull(),
  imagePath: text("image_path").notNull(),
  imageHash: text("image_hash").notNull(),
  originalBreed: text("original_breed").notNull(), // what the engine predicted
  correctedBreed: text("corrected_breed").notNull(), // what the reviewer asserted
  confidence: doublePrecision("confidence").notNull(),
  status: text("status").$type<TeachingStatus>().notNull().default('pending'),
  teachingMessage: text("teaching_message"),
  createdAt: timestamp("created_at").notNull().defaultNow(),
  updatedAt: timestamp("updated_at").notNull().defaultNow(),
}, (table) => ({
  imageHashIdx: index("breed_corrections_image_hash_idx").on(table.imageHash),
  scanIdx: index("breed_corrections_scan_idx").on(table.scanId),
}));

export const notifications = pgTable("notifications", {
  id: serial("id").primaryKey(),
  userId: integer("user_id").notNull().references(() => users.id),
  type: text("type").notNull(), // 'scan_verified'
  title: text("title").notNull(),
  message: text("message").notNull(),
  data: jsonb("data").$type<Record<string, string | number | null>>(),
  read: boolean("read").notNull().default(false),
  readAt: timestamp("read_at"),
  createdAt: timestamp("created_at").notNull().defaultNow(),
});

export const insertBreedCorrectionSchema = createInsertSchema(breedCorrections).omit({
  id: true,
  createdAt: true,
  updatedAt: true,
});

export type User = typeof users.$inferSelect;
export type ScanResult = typeof scanResults.$inferSelect;
export type InsertScanResult = typeof scanResults.$inferInsert;
export type BreedCorrection = typeof breedCorrections.$inferSelect;
export type InsertBreedCorrection = Omit<typeof breedCorrections.$inferInsert, 'id' | 'createdAt' | 'updatedAt'>;
export type Notification = typeof notifications.$inferSelect;
export type InsertNotification = Omit<typeof notifications.$inferInsert, 'id' | 'createdAt' | 'read' | 'readAt'>;
