declare module 'onvif' {
  import { EventEmitter } from 'node:events';

  export type CamOptions = {
    hostname: string;
    username?: string;
    password?: string;
    port?: number;
    timeout?: number;
  };

  export type Profile = {
    $: { token: string };
    name: string;
  };

  export type MediaUri = {
    uri: string;
  };

  export class Cam extends EventEmitter {
    constructor(options: CamOptions, callback?: (error: Error | null) => void);
    profiles?: Profile[];
    getStreamUri(
      options: { protocol?: 'RTSP'; profileToken?: string },
      callback: (error: Error | null, result: MediaUri) => void
    ): void;
  }

  const onvif: { Cam: typeof Cam };
  export default onvif;
}
