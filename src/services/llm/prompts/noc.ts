export const NOC_CHECKLIST = [
  'Signature of the issuing authority with official seal',
  'Clearly stated purpose of the certificate',
  'Validity period or expiry date',
  'Conditions and restrictions attached',
  'Reference number and issue date for legal authorization',
] as const;
