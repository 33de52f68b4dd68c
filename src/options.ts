/*
 * global options
 */

/*
 * this client's protocol version number; 2500 is version 2.5.00
 */
export const client_version: number = 2500;

/*
 * this client's version as shown to users
 */
export const client_version_string: string = '2.5.00';

/*
 * this client's build tag, sent with our version report
 */
export const client_build: string = 'settlers-dispatch';

/*
 * log every dispatched message at debug level
 */
export const debug_traffic: boolean = process.env.DEBUG_TRAFFIC === '1';

/*
 * locale for localized option and scenario strings, or null to use the
 * built-in english text
 */
export const locale: string | null = process.env.SETTLERS_LOCALE ?? null;

/*
 * how long to wait on game option or scenario info replies before giving up
 * on the server, in ms
 */
export const negotiation_timeout: number = 1000 * 5; // 5 seconds

/*
 * initial reconnect delay for the remote transport, in ms
 */
export const reconnect_delay: number = 125;

/*
 * reconnect backoff ceiling, in ms
 */
export const reconnect_delay_max: number = 1000 * 30; // 30 seconds

/*
 * face icon we ask for when sitting down in a new game
 */
export const default_face_id: number = 1;
