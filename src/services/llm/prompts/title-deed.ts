export const TITLE_DEED_CHECKLIST = [
  'Clear chain of title from seller to buyer',
  'Property description with survey number and boundaries',
  'Registration number and date at the sub-registrar',
  'Encumbrance status (mortgages, liens, pending litigation)',
  'Sale consideration amount and mode of payment',
  'Signatures of seller, buyer and witnesses with stamp duty paid',
] as const;
