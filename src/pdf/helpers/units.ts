export const POINTS_PER_INCH = 72;
export const MM_PER_INCH = 25.4;

export const mmToPoints = (mm: number): number => (mm * POINTS_PER_INCH) / MM_PER_INCH;
