/**
 * Tab Source Interface
 *
 * Behavioral contract for the browser collaborator that lists open tabs
 * and hands over a tab's page source.
 */

import type { BrowserTab, BrowserWindow } from "@/types";

/**
 * Interface for tab sources
 *
 * Implementations talk to a browser (or stand in for one); the extraction
 * pipeline treats both results as opaque input.
 */
export interface TabSource {
  /**
   * Unique identifier for this source (used in logs)
   */
  id: string;

  /**
   * Windows with their tabs, in the browser's order
   */
  listWindows(): Promise<BrowserWindow[]>;

  /**
   * Raw HTML currently loaded in a tab
   *
   * @throws When the page source cannot be obtained
   */
  getPageSource(tab: BrowserTab): Promise<string>;
}
