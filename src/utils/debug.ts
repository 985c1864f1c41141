/**
 * Console logging that is silent outside development builds
 */

const isDev = import.meta.env.DEV;

export const debug = {
  warn: (message: string, ...args: unknown[]) => {
    if (isDev) console.warn(message, ...args);
  },

  error: (message: string, ...args: unknown[]) => {
    if (isDev) console.error(message, ...args);
  },
};
