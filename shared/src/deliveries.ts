import { MAX_INGEST_BATCH } from "./constants";
import { chunk } from "./utils/chunk";

/** Payload of one job on the ingestion queue */
export interface IngestDelivery {
  records: unknown[];
  /** How many times these records were handed back already */
  redelivery?: number;
}

/** Split records into deliveries the ingestion consumer accepts */
export function toDeliveries(records: readonly unknown[], size: number = MAX_INGEST_BATCH): IngestDelivery[] {
  return chunk(records, size).map((batch) => ({ records: batch }));
}
