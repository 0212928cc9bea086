/**
 * Stats documents shared by the stats tests.
 */
export const BUILDING_STATS = {
  source: 'udx/bldg/53394611_bldg_6697_op.gml',
  driver: 'GML',
  layer_count: 1,
  layers: [
    {
      name: 'Building',
      feature_count: 125,
      spatial_ref_wkt: 'GEOGCS["JGD2011"]',
      numeric_field_stats: {
        measuredHeight: {
          count: 120,
          min: 2.5,
          max: 48.1,
          mean: 9.75,
          histogram: { bin_edges: [0, 25, 50], counts: [110, 10] },
        },
        storeysAboveGround: {
          count: 0,
          min: null,
          max: null,
          mean: null,
          histogram: { bin_edges: [], counts: [] },
        },
      },
      string_field_frequencies: {
        usage: { '401': 120, '[401, 402]': 5 },
        name: { 東京駅: 1 },
      },
    },
  ],
};
