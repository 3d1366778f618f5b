import { resolve } from "node:path";
import { loadEnv } from "../src/config/env";
import { createLogger, errorMessage } from "../src/config/logger";
import { CandidatesRepository } from "../src/db/repositories/candidates.repo";
import { ResumesRepository } from "../src/db/repositories/resumes.repo";
import { SupabaseRestClient } from "../src/db/supabase.client";
import { DocumentService } from "../src/documents/document.service";
import { readDatasetRecords } from "../src/seeding/dataset";
import { SeedService } from "../src/seeding/seed.service";
import { SupabaseStorageClient } from "../src/storage/supabase-storage.client";

const DEFAULT_DATASET_DIR = "ResumeDataset";

async function main(): Promise<void> {
  const env = loadEnv();
  const logger = createLogger({ minLevel: env.logLevel });
  const datasetDir = resolve(process.argv[2] ?? DEFAULT_DATASET_DIR);

  if (!env.supabaseUrl || !env.supabaseServiceKey) {
    throw new Error("SUPABASE_URL and SUPABASE_SERVICE_KEY must be set to seed the database");
  }

  const restClient = new SupabaseRestClient({
    url: env.supabaseUrl,
    apiKey: env.supabaseServiceKey,
  });
  const storage = new SupabaseStorageClient({
    url: env.supabaseUrl,
    apiKey: env.supabaseServiceKey,
    bucket: env.storageBucket,
  });
  const seedService = new SeedService({
    storage,
    candidates: new CandidatesRepository(logger, restClient),
    resumes: new ResumesRepository(logger, restClient),
    documents: new DocumentService(logger),
    logger,
  });

  logger.info("Database seeding initialized", { datasetDir, bucket: env.storageBucket });
  const records = await readDatasetRecords(datasetDir);
  if (records.length === 0) {
    logger.warn("Dataset has no records; seeding aborted", { datasetDir });
    return;
  }

  await seedService.clearStorage();
  await seedService.clearTables();
  const report = await seedService.seed(records);
  process.stdout.write(
    `Seeding complete: ${report.seeded}/${report.total} records seeded, ${report.failed} failed.\n`,
  );
  await logger.flush();
}

main().catch((error) => {
  process.stderr.write(`Seeding failed: ${errorMessage(error)}\n`);
  process.exit(1);
});
