/**
 * Output formatting type definitions
 */

import type { OUTPUT_FORMATS } from "@/constants/output";

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];
