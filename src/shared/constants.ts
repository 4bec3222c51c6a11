/**
 * Application-wide constants.
 *
 * @module shared/constants
 */

export const APP_NAME = 'seedfile';

export const VERSION = '0.1.0';
