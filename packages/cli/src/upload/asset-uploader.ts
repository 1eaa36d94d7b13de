/**
 * Asset Uploader
 *
 * Pushes the ETL assets into the data and Composer buckets, keeps going
 * past individual failures and reports every item.
 */

import path from "path";
import fs from "fs-extra";
import { glob } from "glob";
import { NotFoundError, errorMessage, noopLog } from "@etlctl/adapters-common";
import type { IObjectStorageService, LogCallback } from "@etlctl/adapters-common";
import { missingOutputs, OUTPUT_KEYS } from "../outputs/infrastructure-outputs";
import type { IOutputResolver } from "../outputs/infrastructure-outputs";
import { parseGcsUrl } from "./gcs-url";
import type { GcsLocation } from "./gcs-url";
import { ETL_UPLOAD_PLAN, VERIFY_PREFIXES } from "./upload-plan";
import type { UploadItem, UploadTarget } from "./upload-plan";

export type UploadStatus = "uploaded" | "missing" | "skipped" | "failed";

export interface UploadResult {
  label: string;
  status: UploadStatus;
  required: boolean;
  /** Destination URLs, or the reason for a non-upload */
  detail: string;
}

export interface PrefixListing {
  location: string;
  objects: string[];
  error?: string;
}

export interface UploadReport {
  dataBucket: string;
  composerLocation: string;
  results: UploadResult[];
  listings: PrefixListing[];
  ok: boolean;
}

export interface AssetUploaderOptions {
  storage: IObjectStorageService;
  outputs: IOutputResolver;
  /** Directory the plan's relative paths resolve against */
  sourceDir: string;
  plan?: readonly UploadItem[];
  log?: LogCallback;
}

const gsUrl = (location: GcsLocation, objectName = "") =>
  `gs://${location.bucket}/${location.prefix}${objectName}`;

export class AssetUploader {
  private readonly storage: IObjectStorageService;
  private readonly plan: readonly UploadItem[];
  private readonly log: LogCallback;

  constructor(private readonly options: AssetUploaderOptions) {
    this.storage = options.storage;
    this.plan = options.plan ?? ETL_UPLOAD_PLAN;
    this.log = options.log ?? noopLog;
  }

  /**
   * @throws NotFoundError when a bucket output is missing; nothing is uploaded then
   */
  async run(): Promise<UploadReport> {
    const outputs = await this.options.outputs.resolve();
    const missing = missingOutputs(outputs, [OUTPUT_KEYS.dataBucket, OUTPUT_KEYS.composerBucket]);
    if (missing.length > 0) {
      throw new NotFoundError(`Cannot upload: missing outputs ${missing.join(", ")}`);
    }

    const locations: Record<UploadTarget, GcsLocation> = {
      data: parseGcsUrl(outputs[OUTPUT_KEYS.dataBucket]),
      composer: parseGcsUrl(outputs[OUTPUT_KEYS.composerBucket]),
    };

    const results: UploadResult[] = [];
    for (const item of this.plan) {
      results.push(await this.uploadItem(item, locations[item.target]));
    }

    const listings: PrefixListing[] = [];
    for (const { target, prefix } of VERIFY_PREFIXES) {
      listings.push(await this.listPrefix(locations[target], prefix));
    }

    return {
      dataBucket: locations.data.bucket,
      composerLocation: gsUrl(locations.composer),
      results,
      listings,
      ok: results.every((r) => !r.required || (r.status !== "missing" && r.status !== "failed")),
    };
  }

  private async uploadItem(item: UploadItem, location: GcsLocation): Promise<UploadResult> {
    const required = item.kind === "folder" ? true : item.required;

    try {
      switch (item.kind) {
        case "folder": {
          const objectName = `${location.prefix}${item.destination}`;
          await this.storage.writeObject(location.bucket, objectName, "");
          return { label: item.label, status: "uploaded", required, detail: gsUrl(location, item.destination) };
        }
        case "file": {
          const localPath = path.resolve(this.options.sourceDir, item.source);
          if (!(await fs.pathExists(localPath))) {
            return this.absent(item.label, required, item.source);
          }
          await this.storage.uploadFile(location.bucket, localPath, `${location.prefix}${item.destination}`);
          return { label: item.label, status: "uploaded", required, detail: gsUrl(location, item.destination) };
        }
        case "glob": {
          const matches = (await glob(item.pattern, { cwd: this.options.sourceDir, nodir: true })).sort();
          if (matches.length === 0) {
            return this.absent(item.label, required, item.pattern);
          }
          const uploaded: string[] = [];
          for (const match of matches) {
            const destination = `${item.destinationPrefix}${path.basename(match)}`;
            await this.storage.uploadFile(
              location.bucket,
              path.resolve(this.options.sourceDir, match),
              `${location.prefix}${destination}`
            );
            uploaded.push(gsUrl(location, destination));
          }
          return { label: item.label, status: "uploaded", required, detail: uploaded.join(", ") };
        }
      }
    } catch (error) {
      this.log(`[Upload] ${item.label} failed: ${errorMessage(error)}`, "stderr");
      return { label: item.label, status: "failed", required, detail: errorMessage(error) };
    }
  }

  private absent(label: string, required: boolean, source: string): UploadResult {
    return required
      ? { label, status: "missing", required, detail: `${source} not found` }
      : { label, status: "skipped", required, detail: `${source} not present` };
  }

  private async listPrefix(location: GcsLocation, prefix: string): Promise<PrefixListing> {
    const fullPrefix = `${location.prefix}${prefix}`;
    const url = `gs://${location.bucket}/${fullPrefix}`;
    try {
      return { location: url, objects: await this.storage.listObjects(location.bucket, fullPrefix) };
    } catch (error) {
      return { location: url, objects: [], error: errorMessage(error) };
    }
  }
}
