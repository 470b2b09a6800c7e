// ============================================================================
// FILE: src/types.ts
// PURPOSE: Core type definitions for the researcher retrieval pipeline
// ============================================================================

// ----------------------------------------------------------------------------
// SECTION 1: ENTITY RECORDS
// These types describe the researcher profiles that get indexed
// ----------------------------------------------------------------------------

/**
 * Project - A funded research project attached to a researcher
 *
 * @property title - Project title as published by the funding body
 * @property years - Free-text year range, e.g. "2019-2022" (may be empty)
 * @property grant_amount - Grant value in the configured currency, null if unknown
 */
export interface Project {
  title: string;
  years: string;
  grant_amount: number | null;
}

/**
 * EntityRecord - One researcher, the unit of retrieval
 *
 * Field names follow the JSON data source so the metadata table can be
 * written back out unchanged.
 *
 * @property name - Display name
 * @property affiliation - Institution / faculty (may be empty)
 * @property research_areas - Ordered topic list
 * @property projects - Ordered project list
 * @property source - Provenance (URL or dataset tag)
 */
export interface EntityRecord {
  name: string;
  affiliation: string;
  research_areas: string[];
  projects: Project[];
  source: string;
}

// ----------------------------------------------------------------------------
// SECTION 2: SEARCH RESULTS
// ----------------------------------------------------------------------------

/**
 * Neighbor - A vector position and its squared L2 distance to a query
 */
export interface Neighbor {
  position: number;
  distance: number;
}

/**
 * RankedRecord - A search hit resolved back to its metadata entry
 */
export interface RankedRecord {
  record: EntityRecord;
  distance: number;
  position: number;
}

// ----------------------------------------------------------------------------
// SECTION 3: CALLBACKS
// ----------------------------------------------------------------------------

export type ProgressCallback = (current: number, total: number) => void;
