/**
 * Path resolution for bootpipe.
 *
 * All knowledge about where artifacts are produced and where they land in
 * the image lives in THIS module. Pipelines never join paths themselves;
 * they ask the resolver for a logical location.
 *
 * Three base directories exist:
 * - the image root (`bootimg/` by default)
 * - the bootloader project root
 * - the kernel project root
 *
 * Resolution is pure: no filesystem access, no errors. Fragments are joined
 * with `path.join`, so separators are normalized for the host platform.
 *
 * @module
 */

import * as path from "node:path";
import { COMPONENT_ORDER, type BootpipeConfig, type ComponentName } from "../config/types.js";

// =============================================================================
// Types
// =============================================================================

/**
 * Where a built artifact must land for the image to be bootable.
 */
export interface StagingMapping {
  /** Component that produces the artifact */
  readonly component: ComponentName;

  /** Absolute path of the build output */
  readonly source: string;

  /** Absolute path inside the image root */
  readonly destination: string;
}

// =============================================================================
// PathResolver Class
// =============================================================================

/**
 * Maps logical names to concrete paths under the configured roots.
 *
 * @example
 * ```typescript
 * const paths = new PathResolver(config);
 *
 * paths.image("EFI/BOOT/BOOTX64.efi"); // "<root>/bootimg/EFI/BOOT/BOOTX64.efi"
 * paths.kernel("target/kernel/debug/kernel");
 * paths.stagingMappings();             // bootloader mapping, then kernel mapping
 * ```
 */
export class PathResolver {
  constructor(private readonly config: BootpipeConfig) {}

  /**
   * Path under the image root. An empty fragment is the image root itself.
   */
  image(fragment = ""): string {
    return path.join(this.config.imageRoot, fragment);
  }

  /**
   * Path under the bootloader project root.
   */
  bootloader(fragment = ""): string {
    return path.join(this.config.targets.bootloader.projectDir, fragment);
  }

  /**
   * Path under the kernel project root.
   */
  kernel(fragment = ""): string {
    return path.join(this.config.targets.kernel.projectDir, fragment);
  }

  /**
   * Build output of a component.
   */
  artifact(component: ComponentName): string {
    const fragment = this.config.targets[component].artifact;
    return component === "bootloader" ? this.bootloader(fragment) : this.kernel(fragment);
  }

  /**
   * Image slot a component's artifact is staged into.
   */
  slot(component: ComponentName): string {
    return this.image(this.config.slots[component]);
  }

  /**
   * One mapping per component, in build order.
   */
  stagingMappings(): readonly StagingMapping[] {
    return COMPONENT_ORDER.map((component) =>
      Object.freeze({
        component,
        source: this.artifact(component),
        destination: this.slot(component),
      }),
    );
  }
}
