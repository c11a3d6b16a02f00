export {
  ENVELOPE_HEADER_SIZE,
  MAX_ENVELOPE_LENGTH,
  PUBLIC_VALUE_SIZE,
  type Envelope,
} from './types.js';

export {
  encodeEnvelopeHeader,
  decodeEnvelopeHeader,
  encodeEnvelope,
  decodeEnvelope,
  encodePublicValue,
  decodePublicValue,
} from './envelope.js';
