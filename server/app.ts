import express, { type Express } from "express";
import OpenAI from "openai";
import type { AppConfig } from "./config";
import { createDatabase } from "./db";
import { DatabaseStorage, type IStorage } from "./storage";
import { MemStorage } from "./mem-storage";
import { GcsBlobStore, MemoryBlobStore, type BlobStore } from "./blob-storage";
import { HttpBreedClassifier, type BreedClassifier } from "./classifier-client";
import { OpenAiBreedIdentifier, type BreedIdentifier } from "./breed-identifier";
import { OpenAiImageGenerator, type ImageGenerator } from "./image-generator";
import { BreedConsensusEngine } from "./breed-consensus";
import { ContentHashCache } from "./content-hash";
import { CorrectionService } from "./corrections";
import { ScanRecords } from "./scan-records";
import { AgeSimulationJob, variantBudgetMs } from "./age-simulation-job";
import { AgeSimulationQueue } from "./age-simulation-queue";
import { ScanPipeline } from "./scan-pipeline";
import { registerRoutes, type AppServices } from "./routes";
import { errorMiddleware } from "./error-handling";
import { MAX_UPLOAD_BYTES } from "@shared/routes";
import type { Sleep } from "./retry-strategy";

export function log(message: string, source = "express") {
  const formattedTime = new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });

  console.log(`${formattedTime} [${source}] ${message}`);
}

export interface ServiceOverrides {
  storage?: IStorage;
  blobs?: BlobStore;
  classifier?: BreedClassifier;
  identifier?: BreedIdentifier;
  generator?: ImageGenerator;
  random?: () => number;
  sleep?: Sleep;
  newScanId?: () => string;
}

function defaultStorage(config: AppConfig): IStorage {
  if (!config.databaseUrl) {
    log("DATABASE_URL not set, using in-memory storage", "storage");
    return new MemStorage();
  }
  return new DatabaseStorage(createDatabase(config.databaseUrl).db);
}

function defaultBlobs(config: AppConfig): BlobStore {
  if (!config.objectStorage.bucket) {
    log("OBJECT_STORAGE_BUCKET not set, keeping images in memory", "storage");
    return new MemoryBlobStore();
  }
  return new GcsBlobStore(config.objectStorage.bucket, config.objectStorage.publicUrl);
}

/**
 * Wires every collaborator from configuration. Tests pass fakes for the
 * external services through overrides.
 */
export function buildServices(config: AppConfig, overrides: ServiceOverrides = {}): AppServices {
  const storage = overrides.storage ?? defaultStorage(config);
  const blobs = overrides.blobs ?? defaultBlobs(config);

  const classifier = overrides.classifier
    ?? new HttpBreedClassifier(config.classifier.baseUrl, config.classifier.timeoutMs);
  if (!config.identifier.apiKey || !config.imageGeneration.apiKey) {
    log("Model API keys missing, identification and age simulation calls will fail", "config");
  }

  // An empty key still builds a client; calls then fail as unavailable
  const identifier = overrides.identifier ?? new OpenAiBreedIdentifier(
    new OpenAI({ apiKey: config.identifier.apiKey ?? '', baseURL: config.identifier.baseUrl, maxRetries: 0 }),
    { model: config.identifier.model, timeoutMs: config.identifier.timeoutMs },
  );
  const generator = overrides.generator ?? new OpenAiImageGenerator(
    new OpenAI({ apiKey: config.imageGeneration.apiKey ?? '', maxRetries: 0 }),
    { model: config.imageGeneration.model, timeoutMs: config.imageGeneration.timeoutMs },
  );

  const variantBudget = variantBudgetMs(config.imageGeneration.timeoutMs);
  if (config.simulation.jobTimeoutMs <= variantBudget) {
    log(`SIMULATION_JOB_TIMEOUT_MS is at or below one variant's worst case (${variantBudget}ms); slow variants will be cut off`, "config");
  }

  const records = new ScanRecords(storage, blobs);
  const job = new AgeSimulationJob({ records, blobs, generator, sleep: overrides.sleep });
  const queue = new AgeSimulationQueue(job, records, {
    concurrency: config.simulation.concurrency,
    jobTimeoutMs: config.simulation.jobTimeoutMs,
    jobAttempts: config.simulation.jobAttempts,
    sleep: overrides.sleep,
  });
  const corrections = new CorrectionService(storage, records, blobs, classifier);
  const pipeline = new ScanPipeline({
    storage,
    records,
    blobs,
    hashCache: new ContentHashCache(storage),
    corrections,
    consensus: new BreedConsensusEngine(classifier, identifier, overrides.random),
    identifier,
    queue,
    newScanId: overrides.newScanId,
  });

  return { storage, records, blobs, pipeline, corrections, classifier, queue };
}

export function createApp(services: AppServices): Express {
  const app = express();

  // Base64 inflates uploads by about a third
  app.use(express.json({ limit: Math.ceil(MAX_UPLOAD_BYTES * 1.4) }));
  app.use(express.urlencoded({ extended: false }));

  app.use((req, res, next) => {
    const start = Date.now();
    const path = req.path;

    res.on("finish", () => {
      const duration = Date.now() - start;
      if (path.startsWith("/api")) {
        log(`${req.method} ${path} ${res.statusCode} in ${duration}ms`);
      }
    });

    next();
  });

  registerRoutes(app, services);
  app.use(errorMiddleware);
  return app;
}
