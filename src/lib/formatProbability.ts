export function formatProbability(
  probability: number,
  decimals: number = 4,
): string {
  return probability.toFixed(decimals);
}

export function formatProbabilityAsPercentage(
  probability: number,
  decimals: number = 2,
): string {
  const percentage = probability * 100;

  if (percentage === 0) return "0%";
  if (percentage === 100) return "100%";

  return percentage.toFixed(decimals) + "%";
}
