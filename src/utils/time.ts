export const secondsToMs = (seconds: number): number => {
  return Math.max(0, Math.round(seconds * 1000));
};
