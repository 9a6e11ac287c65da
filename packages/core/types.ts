/**
 * Core types for the court grid ingestion system
 *
 * Clock times are minutes since midnight (0-1439). They are only formatted
 * as HH:MM at the storage and snapshot boundary.
 */

export type MinuteOfDay = number

export type SlotStatus = 'booked' | 'available'

export type RunStatus = 'running' | 'completed' | 'failed'

export type WriteMode = 'append' | 'replace'

export interface Calibration {
  originPixels: number           // x position of 00:00 on the grid
  pixelsPerHour: number
  hourOffset: number             // signed, may be fractional
}

export interface DisplayWindow {
  start: MinuteOfDay
  end: MinuteOfDay
}

export interface Venue {
  id: string
  name: string
  url: string
  calibration?: Calibration
  displayWindow?: DisplayWindow
}

export interface Resource {
  id: string
  venueId: string
  name: string
}

/**
 * One cell in a resource row, as read from the page
 */
export type GridMarker = GeometricMarker | AttributeMarker

export interface GeometricMarker {
  kind: 'geometric'
  x: number
  width: number
  occupied: boolean
}

export interface AttributeMarker {
  kind: 'attribute'
  start?: string
  end?: string
}

export type MarkerShape = 'geometric' | 'attribute'

export interface GridRow {
  resourceName: string
  markers: GridMarker[]
}

export interface RawInterval {
  start: MinuteOfDay
  end: MinuteOfDay
}

export interface Interval {
  resourceId: string
  date: string                   // YYYY-MM-DD
  start: MinuteOfDay
  end: MinuteOfDay               // stored modulo 24h
  durationMinutes: number
  status: SlotStatus
  runId: string
  observedAt: Date
}

export interface Run {
  id: string
  startedAt: Date
  status: RunStatus
  venuesCovered: number
  intervalsProduced: number
  intervalsFailed: number
  bookingDate: string
  source: string
  notes?: string
}

export interface RunTotals {
  venuesCovered: number
  intervalsProduced: number
  intervalsFailed: number
}

export interface GridRequest {
  shape: MarkerShape
  date: string                   // YYYY-MM-DD the grid must show
  timeoutMs: number
}

/**
 * Reads one venue's booking grid. "No rows" is an empty array.
 */
export interface GridReader {
  readGrid(venue: Venue, request: GridRequest): Promise<GridRow[]>
}
