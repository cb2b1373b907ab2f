/**
 * Navigation Profile Types
 *
 * Type definitions for the CFG-NAV5 dynamics profiles.
 */

// ============================================================================
// Enums
// ============================================================================

export type ConfiguredProfileName =
  | 'portable'
  | 'stationary'
  | 'pedestrian'
  | 'automotive'
  | 'sea'
  | 'airborne_lt_1g'
  | 'airborne_lt_2g'
  | 'airborne_lt_4g'
  | 'wrist';

export type ProfileName = ConfiguredProfileName | 'poll';

/** CFG-NAV5 payload fields, in wire order */
export type Nav5FieldName =
  | 'mask'
  | 'dynModel'
  | 'fixMode'
  | 'fixedAlt'
  | 'fixedAltVar'
  | 'minElev'
  | 'drLimit'
  | 'pDop'
  | 'tDop'
  | 'pAcc'
  | 'tAcc'
  | 'staticHoldThresh'
  | 'dgnssTimeout'
  | 'cnoThreshNumSVs'
  | 'cnoThresh'
  | 'reserved1'
  | 'staticHoldMaxDist'
  | 'utcStandard'
  | 'reserved2';

export type FieldWidth = 1 | 2 | 4 | 5;

// ============================================================================
// Field Table
// ============================================================================

export interface FieldSpec {
  name: Nav5FieldName;
  width: FieldWidth;
  signed: boolean;
  /** Structural fields (dynModel, reserved) cannot be overridden */
  overridable: boolean;
  defaultValue: number;
}

export interface ProfileField {
  name: Nav5FieldName;
  width: FieldWidth;
  signed: boolean;
  value: number;
}

// ============================================================================
// Profile Interfaces
// ============================================================================

/**
 * Query-only profile: polls the receiver for its current CFG-NAV5 block
 */
export interface PollProfile {
  kind: 'poll';
  name: 'poll';
}

/**
 * Profile carrying a full CFG-NAV5 block
 */
export interface ConfiguredProfile {
  kind: 'configured';
  name: ConfiguredProfileName;
  fields: readonly ProfileField[];
}

export type Profile = PollProfile | ConfiguredProfile;

/**
 * CFG-NAV5 block as read back from the receiver
 */
export interface DecodedNav5 {
  dynModel: number;
  /** Catalog profile matching dynModel, if any */
  profile?: ConfiguredProfileName;
  fields: ProfileField[];
}

export interface FieldOverride {
  name: string;
  value: number;
}
