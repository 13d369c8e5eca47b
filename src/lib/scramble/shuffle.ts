import type { RandomSource } from "./random";

// Fisher-Yates on a copy; the input array is never touched.
export const shuffle = <T>(items: readonly T[], random: RandomSource = Math.random): T[] => {
  const copy = [...items];
  for (let index = copy.length - 1; index > 0; index -= 1) {
    const swapIndex = Math.floor(random() * (index + 1));
    [copy[index], copy[swapIndex]] = [copy[swapIndex], copy[index]];
  }
  return copy;
};
