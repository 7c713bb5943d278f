export const PACKET_SIZE = 48;

export enum LeapIndicator {
  NoAdjustment = 0,
  AddSecond = 1, // Last minute of the day has 61 seconds
  SubtractSecond = 2, // Last minute of the day has 59 seconds
  AlarmCondition = 3 // Clock unsynchronized
}

export enum Version { V1 = 1, V2, V3, V4 }

export enum Mode {
  Reserved = 0,
  SymmetricActive = 1,
  SymmetricPassive = 2,
  Client = 3,
  Server = 4,
  Broadcast = 5,
  ControlMessage = 6,
  Private = 7
}

export enum Stratum {
  Unspecified = 0, // Also used for kiss-of-death responses
  Primary = 1,
  Secondary = 2,
  Tertiary = 3,
  Reserved = 255
}

/** Log2 seconds between successive messages. */
export enum PollInterval {
  Minimum = 4, // 16 seconds
  Default = 6, // 64 seconds
  Maximum = 10 // 1024 seconds
}

/** Log2 seconds of local clock resolution. */
export enum Precision {
  OneSecond = 0,
  OneMillisecond = -10,
  OneMicrosecond = -20,
  OneNanosecond = -30
}

/** Reference identifiers for stratum 1 servers. */
export enum ReferenceSource {
  Local = 'LOCL', // Uncalibrated local clock
  Cesium = 'CESM',
  Rubidium = 'RBDM',
  PulsePerSecond = 'PPS',
  IRIG = 'IRIG', // Inter-Range Instrumentation Group
  ACTS = 'ACTS', // NIST telephone modem service
  USNO = 'USNO', // USNO telephone modem service
  PTB = 'PTB', // PTB (Germany) telephone modem service
  TDF = 'TDF', // Allouis (France) Radio 164 kHz
  DCF = 'DCF', // Mainflingen (Germany) Radio 77.5 kHz
  MSF = 'MSF', // Rugby (UK) Radio 60 kHz
  WWV = 'WWV', // Ft. Collins (US) Radio 2.5, 5, 10, 15, 20 MHz
  WWVB = 'WWVB', // Boulder (US) Radio 60 kHz
  WWVH = 'WWVH', // Kauai Hawaii (US) Radio 2.5, 5, 10, 15 MHz
  CHU = 'CHU', // Ottawa (Canada) Radio 3330, 7335, 14670 kHz
  LORAN = 'LORC',
  OMEGA = 'OMEG',
  GPS = 'GPS'
}

/** Codes a stratum 0 "kiss-of-death" response carries in place of a reference identifier. */
export enum KissCode {
  Anycast = 'ACST',
  Authentication = 'AUTH',
  Autokey = 'AUTO',
  Broadcast = 'BCST',
  Cryptographic = 'CRYP',
  Deny = 'DENY',
  LostPeer = 'DROP',
  LocalPolicy = 'RSTR',
  NotSynchronized = 'INIT',
  Manycast = 'MCST',
  NoKeyFound = 'NKEY',
  RateExceeded = 'RATE',
  Remote = 'RMOT',
  StepNotSynchronized = 'STEP'
}

const referenceSources = new Set<string>(Object.values(ReferenceSource));

export function isReferenceSource(code: string): code is ReferenceSource {
  return referenceSources.has(code);
}
