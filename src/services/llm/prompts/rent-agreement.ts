export const RENT_AGREEMENT_CHECKLIST = [
  'Lease term within 11 months, or registration if longer',
  'Stamp duty paid and stated',
  'Signatures of landlord, tenant and two witnesses',
  'Rent amount, due date and escalation',
  'Security deposit amount and refund terms',
  'Maintenance and utility responsibilities',
  'Lock-in period and notice period for termination',
  'Compliance with state rent control law',
] as const;
