/**
 * Tab source type definitions
 *
 * Shapes supplied by the browser collaborator.
 */

export type BrowserTab = {
  /** 1-based position within its window */
  index: number;
  title: string;
  url: string;
  isActive: boolean;
};

export type BrowserWindow = {
  index: number;
  name: string;
  tabs: BrowserTab[];
};
