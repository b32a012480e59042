export const EXAMPLE_QUERIES = [
  'Welche Fristen gelten für Baugesuche?',
  'Was regelt das Personalgesetz?',
  'Welche Pflichten haben Arbeitgeber im Kanton Bern?',
  'Wie funktioniert die Steuererklärung?',
] as const;
