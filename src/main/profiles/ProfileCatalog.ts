import type {
  ConfiguredProfile,
  ConfiguredProfileName,
  DecodedNav5,
  FieldOverride,
  FieldSpec,
  Nav5FieldName,
  Profile,
  ProfileField,
  ProfileName,
} from '../../shared/types/profile.types';
import { decodeValue, encodeValue } from './fieldCodec';
import { InvalidFieldError, UBXError, UnknownProfileError } from '../utils/errors';
import { UBX_PROTOCOL } from '../ubx/types';

/**
 * CFG-NAV5 payload layout. The order is the wire order and must not change.
 */
export const NAV5_FIELDS: readonly FieldSpec[] = [
  { name: 'mask', width: 2, signed: false, overridable: true, defaultValue: 0xffff },
  { name: 'dynModel', width: 1, signed: false, overridable: false, defaultValue: 0 },
  { name: 'fixMode', width: 1, signed: false, overridable: true, defaultValue: 3 },
  { name: 'fixedAlt', width: 4, signed: true, overridable: true, defaultValue: 0 },
  { name: 'fixedAltVar', width: 4, signed: false, overridable: true, defaultValue: 10000 },
  { name: 'minElev', width: 1, signed: true, overridable: true, defaultValue: 5 },
  { name: 'drLimit', width: 1, signed: false, overridable: true, defaultValue: 0 },
  { name: 'pDop', width: 2, signed: false, overridable: true, defaultValue: 250 },
  { name: 'tDop', width: 2, signed: false, overridable: true, defaultValue: 250 },
  { name: 'pAcc', width: 2, signed: false, overridable: true, defaultValue: 100 },
  { name: 'tAcc', width: 2, signed: false, overridable: true, defaultValue: 300 },
  { name: 'staticHoldThresh', width: 1, signed: false, overridable: true, defaultValue: 0 },
  { name: 'dgnssTimeout', width: 1, signed: false, overridable: true, defaultValue: 60 },
  { name: 'cnoThreshNumSVs', width: 1, signed: false, overridable: true, defaultValue: 0 },
  { name: 'cnoThresh', width: 1, signed: false, overridable: true, defaultValue: 0 },
  { name: 'reserved1', width: 2, signed: false, overridable: false, defaultValue: 0 },
  { name: 'staticHoldMaxDist', width: 2, signed: false, overridable: true, defaultValue: 0 },
  { name: 'utcStandard', width: 1, signed: false, overridable: true, defaultValue: 0 },
  { name: 'reserved2', width: 5, signed: false, overridable: false, defaultValue: 0 },
];

/** dynModel code sent for each profile */
export const DYN_MODELS: Readonly<Record<ConfiguredProfileName, number>> = {
  portable: 0,
  stationary: 2,
  pedestrian: 3,
  automotive: 4,
  sea: 5,
  airborne_lt_1g: 6,
  airborne_lt_2g: 7,
  airborne_lt_4g: 8,
  wrist: 9,
};

export const CONFIGURED_PROFILE_NAMES: readonly ConfiguredProfileName[] = [
  'portable',
  'stationary',
  'pedestrian',
  'automotive',
  'sea',
  'airborne_lt_1g',
  'airborne_lt_2g',
  'airborne_lt_4g',
  'wrist',
];

export const PROFILE_NAMES: readonly ProfileName[] = [...CONFIGURED_PROFILE_NAMES, 'poll'];

export const OVERRIDABLE_FIELDS: readonly Nav5FieldName[] = NAV5_FIELDS
  .filter(spec => spec.overridable)
  .map(spec => spec.name);

export function isProfileName(name: string): name is ProfileName {
  return PROFILE_NAMES.some(profile => profile === name);
}

export function getFieldSpec(name: string): FieldSpec | undefined {
  return NAV5_FIELDS.find(spec => spec.name === name);
}

export function dynModelName(code: number): ConfiguredProfileName | undefined {
  return CONFIGURED_PROFILE_NAMES.find(name => DYN_MODELS[name] === code);
}

/**
 * Returns a fresh profile; callers own it and nothing else sees their overrides.
 */
export function getProfile(name: string): Profile {
  if (name === 'poll') {
    return { kind: 'poll', name: 'poll' };
  }

  const configured = CONFIGURED_PROFILE_NAMES.find(profile => profile === name);
  if (!configured) {
    throw new UnknownProfileError(name);
  }

  return {
    kind: 'configured',
    name: configured,
    fields: NAV5_FIELDS.map(spec => ({
      name: spec.name,
      width: spec.width,
      signed: spec.signed,
      value: spec.name === 'dynModel' ? DYN_MODELS[configured] : spec.defaultValue,
    })),
  };
}

/**
 * Encode a single CFG-NAV5 field.
 * @throws InvalidFieldError for names outside the field table
 * @throws FieldOverflowError when the value does not fit the field
 */
export function encodeField(name: string, value: number): Buffer {
  const spec = getFieldSpec(name);
  if (!spec) {
    throw new InvalidFieldError(`Unknown field "${name}"`, name);
  }
  return encodeValue(spec, value);
}

/** CFG-NAV5 payload for a profile; empty for poll */
export function payloadFor(profile: Profile): Buffer {
  if (profile.kind === 'poll') {
    return Buffer.alloc(0);
  }
  return Buffer.concat(profile.fields.map(field => encodeValue(field, field.value)));
}

/**
 * Return a copy of `profile` with one field replaced.
 * Field order and widths are never touched.
 */
export function applyOverride(profile: Profile, name: string, value: number): ConfiguredProfile {
  if (profile.kind === 'poll') {
    throw new InvalidFieldError(`Profile "poll" has no fields to override ("${name}")`, name);
  }

  const spec = getFieldSpec(name);
  if (!spec || !spec.overridable) {
    throw new InvalidFieldError(
      `Field "${name}" cannot be overridden (allowed: ${OVERRIDABLE_FIELDS.join(', ')})`,
      name
    );
  }

  encodeValue(spec, value);

  return {
    ...profile,
    fields: profile.fields.map(field => (field.name === spec.name ? { ...field, value } : field)),
  };
}

export function applyOverrides(profile: Profile, overrides: readonly FieldOverride[]): Profile {
  return overrides.reduce<Profile>(
    (current, override) => applyOverride(current, override.name, override.value),
    profile
  );
}

export function fieldValue(fields: readonly ProfileField[], name: Nav5FieldName): number | undefined {
  return fields.find(field => field.name === name)?.value;
}

/**
 * Decode a CFG-NAV5 payload read back from the receiver, field by field.
 */
export function decodeNav5(payload: Buffer): DecodedNav5 {
  if (payload.length !== UBX_PROTOCOL.NAV5_PAYLOAD_SIZE) {
    throw new UBXError(
      `CFG-NAV5 payload must be ${UBX_PROTOCOL.NAV5_PAYLOAD_SIZE} bytes, got ${payload.length}`
    );
  }

  let offset = 0;
  const fields: ProfileField[] = NAV5_FIELDS.map(spec => {
    const value = decodeValue(spec, payload, offset);
    offset += spec.width;
    return { name: spec.name, width: spec.width, signed: spec.signed, value };
  });

  const dynModel = fieldValue(fields, 'dynModel') ?? 0;
  return { dynModel, profile: dynModelName(dynModel), fields };
}
