import { ConversionError, errorMessage } from "../errors";
import { Extension, NamedResourceReference, Runtime, Shoot } from "../types";

/**
 * A single step of a Shoot pipeline. Steps mutate the working copy in place
 * and throw to abort the pipeline.
 */
export interface ShootExtender {
  name: string;
  extend(runtime: Runtime, shoot: Shoot): void;
}

export type ShootPipeline = readonly ShootExtender[];

/**
 * Runs the extenders in order on a copy of `base`. The first failure aborts
 * the run and the partially built copy is dropped.
 */
export function runPipeline(
  pipeline: ShootPipeline,
  runtime: Runtime,
  base: Shoot,
): Shoot {
  const shoot = structuredClone(base);

  for (const extender of pipeline) {
    try {
      extender.extend(runtime, shoot);
    } catch (error) {
      if (error instanceof ConversionError) {
        throw error;
      }
      throw new ConversionError(
        `${extender.name} failed for runtime ${runtime.metadata.name}: ${errorMessage(error)}`,
      );
    }
  }

  return shoot;
}

/**
 * Replaces the extension with the same type or appends it.
 */
export function upsertExtension(shoot: Shoot, extension: Extension): void {
  const extensions = shoot.spec.extensions ?? [];
  const index = extensions.findIndex((e) => e.type === extension.type);
  if (index === -1) {
    extensions.push(extension);
  } else {
    extensions[index] = extension;
  }
  shoot.spec.extensions = extensions;
}

export function upsertResource(
  shoot: Shoot,
  resource: NamedResourceReference,
): void {
  const resources = shoot.spec.resources ?? [];
  const index = resources.findIndex((r) => r.name === resource.name);
  if (index === -1) {
    resources.push(resource);
  } else {
    resources[index] = resource;
  }
  shoot.spec.resources = resources;
}
