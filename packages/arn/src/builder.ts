/**
 * @akton/arn — Staged builder.
 *
 * Each stage exposes only the next legal step, so an incomplete ARN
 * cannot reach build():
 *
 *   ArnBuilder.create()
 *     .partition("prod")
 *     .service("billing")
 *     .category("acct1")
 *     .generate("usr")     // or .resourceId("usr_...")
 *     .build();
 *
 * Every step validates immediately and throws ArnError. Builders are
 * immutable; each step returns a new one.
 */

import type { RandomSource, TypedId } from "@akton/typeid";
import { ArnError } from "./types.js";
import type { Arn, TextSegmentName } from "./types.js";
import { validateSegment } from "./segments.js";
import { arnWithId, createArn, formatArn, unwrapArn } from "./codec.js";

// =============================================================================
// Stages
// =============================================================================

export interface PartitionStage {
  partition(value: string): ServiceStage;
}

export interface ServiceStage {
  service(value: string): CategoryStage;
}

export interface CategoryStage {
  /** "" is a valid category. */
  category(value: string): ResourceIdStage;
}

export interface ResourceIdStage {
  /** Use an identifier issued earlier. */
  resourceId(id: TypedId | string): BuildStage;
  /** Mint a new identifier, tagged "root" unless told otherwise. */
  generate(tag?: string, random?: RandomSource): BuildStage;
}

export interface BuildStage {
  build(): Arn;
}

// =============================================================================
// Builder
// =============================================================================

interface Draft {
  readonly partition?: string;
  readonly service?: string;
  readonly category?: string;
  readonly arn?: Arn;
}

export class ArnBuilder
  implements PartitionStage, ServiceStage, CategoryStage, ResourceIdStage, BuildStage
{
  private readonly draft: Draft;

  private constructor(draft: Draft) {
    this.draft = draft;
  }

  static create(): PartitionStage {
    return new ArnBuilder({});
  }

  partition(value: string): ServiceStage {
    return this.withSegment("partition", value);
  }

  service(value: string): CategoryStage {
    return this.withSegment("service", value);
  }

  category(value: string): ResourceIdStage {
    return this.withSegment("category", value);
  }

  resourceId(id: TypedId | string): BuildStage {
    const { partition, service, category } = this.segments();
    return new ArnBuilder({
      ...this.draft,
      arn: unwrapArn(arnWithId(partition, service, category, id)),
    });
  }

  generate(tag?: string, random?: RandomSource): BuildStage {
    const { partition, service, category } = this.segments();
    return new ArnBuilder({
      ...this.draft,
      arn: unwrapArn(createArn(partition, service, category, { tag, random })),
    });
  }

  build(): Arn {
    if (this.draft.arn === undefined) {
      throw new ArnError("MALFORMED_ARN", "Missing resourceId", "");
    }
    return this.draft.arn;
  }

  toString(): string {
    return this.draft.arn === undefined ? "ArnBuilder(incomplete)" : formatArn(this.draft.arn);
  }

  // ─── Internal ──────────────────────────────────────────────────────────

  private withSegment(name: TextSegmentName, value: string): ArnBuilder {
    const error = validateSegment(name, value);
    if (error !== undefined) {
      throw error;
    }
    switch (name) {
      case "partition":
        return new ArnBuilder({ ...this.draft, partition: value });
      case "service":
        return new ArnBuilder({ ...this.draft, service: value });
      case "category":
        return new ArnBuilder({ ...this.draft, category: value });
    }
  }

  private segments(): { partition: string; service: string; category: string } {
    const { partition, service, category } = this.draft;
    if (partition === undefined) {
      throw new ArnError("MALFORMED_ARN", "Missing partition", "");
    }
    if (service === undefined) {
      throw new ArnError("MALFORMED_ARN", "Missing service", "");
    }
    if (category === undefined) {
      throw new ArnError("MALFORMED_ARN", "Missing category", "");
    }
    return { partition, service, category };
  }
}
