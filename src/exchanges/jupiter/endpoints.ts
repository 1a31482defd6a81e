export const JUPITER_BASE_URL = 'https://quote-api.jup.ag/v6';

export const jupiterEndpoints = {
  quote: () => '/quote',
  swap: () => '/swap'
};
