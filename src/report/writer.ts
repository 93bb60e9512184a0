import { createHash } from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import type { SchemaRegistry } from "../schema/registry.js";
import type { RunResult } from "../types/step.js";
import { buildJunitXml } from "./junit.js";

export type ReportArtifact = {
  path: string;
  sha256: string;
  bytes: number;
  media_type: string;
};

export type RunManifest = {
  run_id: string;
  created_at: string;
  schema_registry: Record<string, string>;
  artifacts: ReportArtifact[];
};

function sha256Hex(content: string | Buffer): string {
  return createHash("sha256").update(content).digest("hex");
}

/**
 * Owns `<artifactsDir>/<runId>/` for one run.
 * Every file written is recorded with its sha256 in manifest.json.
 */
export class RunReportWriter {
  private artifacts: ReportArtifact[] = [];
  private readonly runDir: string;

  constructor(
    baseDir: string,
    private readonly runId: string,
    private readonly registry: SchemaRegistry,
  ) {
    this.runDir = path.join(baseDir, runId);
  }

  getRunDir(): string {
    return this.runDir;
  }

  getArtifacts(): ReportArtifact[] {
    return [...this.artifacts];
  }

  /** Write one file under the run directory and track it. */
  writeFile(relativePath: string, content: string, mediaType: string): ReportArtifact {
    const fullPath = path.join(this.runDir, relativePath);
    fs.mkdirSync(path.dirname(fullPath), { recursive: true });
    fs.writeFileSync(fullPath, content, "utf8");

    const artifact: ReportArtifact = {
      path: relativePath,
      sha256: sha256Hex(content),
      bytes: Buffer.byteLength(content, "utf8"),
      media_type: mediaType,
    };
    this.artifacts.push(artifact);
    return artifact;
  }

  /** result.json, after checking it against the run-result schema. */
  writeResult(result: RunResult): ReportArtifact {
    const json = JSON.stringify(result, null, 2) + "\n";
    const { valid, errors } = this.registry.validate("run-result", JSON.parse(json));
    if (!valid) throw new Error(`Run result does not match schema: ${errors}`);
    return this.writeFile("result.json", json, "application/json");
  }

  writeJunit(result: RunResult): ReportArtifact {
    return this.writeFile("junit.xml", buildJunitXml(result), "application/xml");
  }

  writeManifest(): RunManifest {
    const manifest: RunManifest = {
      run_id: this.runId,
      created_at: new Date().toISOString(),
      schema_registry: this.registry.versions(),
      artifacts: this.getArtifacts(),
    };
    const { valid, errors } = this.registry.validate("run-manifest", manifest);
    if (!valid) throw new Error(`Run manifest does not match schema: ${errors}`);

    fs.mkdirSync(this.runDir, { recursive: true });
    fs.writeFileSync(path.join(this.runDir, "manifest.json"), JSON.stringify(manifest, null, 2) + "\n", "utf8");
    return manifest;
  }
}

/** Write result.json, junit.xml and manifest.json for a finished run. */
export function writeRunReport(
  result: RunResult,
  artifactsDir: string,
  registry: SchemaRegistry,
): { runDir: string; manifest: RunManifest } {
  const writer = new RunReportWriter(artifactsDir, result.run_id, registry);
  writer.writeResult(result);
  writer.writeJunit(result);
  return { runDir: writer.getRunDir(), manifest: writer.writeManifest() };
}

/** Check every manifest entry against the file on disk. Returns mismatching paths. */
export function verifyRunReport(runDir: string): string[] {
  const manifest: RunManifest = JSON.parse(fs.readFileSync(path.join(runDir, "manifest.json"), "utf8"));
  const mismatches: string[] = [];
  for (const artifact of manifest.artifacts) {
    const target = path.join(runDir, artifact.path);
    if (!fs.existsSync(target) || sha256Hex(fs.readFileSync(target)) !== artifact.sha256) {
      mismatches.push(artifact.path);
    }
  }
  return mismatches;
}
