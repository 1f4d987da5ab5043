import { mimeTypeForArtifactType, type ArtifactRecord, type ArtifactType } from "../core/artifact.js";
import type { ArtifactId, ProjectId, RunId } from "../core/ids.js";
import { newArtifactId } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import type { PostgresStore } from "../store/postgresStore.js";
import type { LocalObjectStore } from "./localObjectStore.js";

export type ArtifactImportSource =
  | { kind: "inline_text"; text: string }
  | { kind: "local_path"; path: string };

export class ArtifactService {
  constructor(
    private readonly store: PostgresStore,
    private readonly objects: LocalObjectStore
  ) {}

  async importArtifact(input: {
    projectId: ProjectId;
    source: ArtifactImportSource;
    type: ArtifactType;
    label: string | null;
    createdByRunId: RunId | null;
    maxBytes: bigint | null;
  }): Promise<ArtifactRecord> {
    const artifactId = newArtifactId();

    const putResult =
      input.source.kind === "inline_text"
        ? await this.objects.putInlineText(artifactId, input.source.text)
        : await this.objects.putFromLocalPath(artifactId, input.source.path, input.maxBytes);

    const metadata: JsonObject = {
      import: {
        kind: input.source.kind,
        label: input.label,
        ...(input.source.kind === "local_path" ? { path: input.source.path } : {})
      }
    };

    return this.store.createArtifact({
      artifactId,
      projectId: input.projectId,
      type: input.type,
      uri: putResult.uri,
      mimeType: mimeTypeForArtifactType(input.type),
      sizeBytes: putResult.sizeBytes,
      checksumSha256: putResult.checksumSha256,
      label: input.label,
      createdByRunId: input.createdByRunId,
      metadata
    });
  }

  async getArtifact(artifactId: ArtifactId): Promise<ArtifactRecord | null> {
    return this.store.getArtifact(artifactId);
  }

  async previewText(artifactId: ArtifactId, opts: { maxBytes: number; maxLines: number }): Promise<{ preview: string; truncated: boolean }> {
    return this.objects.readTextPreview(artifactId, opts);
  }
}
