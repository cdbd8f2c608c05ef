/**
 * Consistent visual encodings for size/power scatter plots
 */
export const RegionEncoding = {
  color: {
    dominated: 'orange',
    undominated: 'blue',
    selected: 'darkblue',
    budget: 'red',
  },

  // Marker areas
  radius: {
    lrt: 100,
    other: 30,
    selected: 100,
  },

  opacity: 0.5,
} as const;
