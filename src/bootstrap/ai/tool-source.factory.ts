// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/ai/tool-source.factory`
 * Purpose: Create the process tool registry with the course tools bound to a catalog capability.
 * Scope: Factory for tool source port. Does NOT execute tools.
 * Invariants:
 *   - TOOL_BINDING_REQUIRED: Every name in COURSE_TOOL_NAMES is registered, or startup fails
 *   - TOOL_ID_STABILITY: Duplicate names throw (enforced by StaticToolSource)
 * Side-effects: none
 * Links: container.ts, capabilities/course-catalog.ts
 * @internal
 */

import { createStaticToolSource, type StaticToolSource } from "@coursemate/ai-core";
import {
  COURSE_TOOL_NAMES,
  type CourseCatalogCapability,
  createCourseToolRuntimes,
} from "@coursemate/ai-tools";

/**
 * @throws Error if a course tool is missing from the built runtimes
 */
export function createCourseToolSource(
  courseCatalog: CourseCatalogCapability
): StaticToolSource {
  const source = createStaticToolSource(
    createCourseToolRuntimes({ courseCatalog })
  );

  for (const name of COURSE_TOOL_NAMES) {
    if (!source.hasToolId(name)) {
      throw new Error(
        `TOOL_BINDING_REQUIRED: Missing runtime for tool "${name}". ` +
          "Add it in createCourseToolRuntimes()."
      );
    }
  }

  return source;
}
