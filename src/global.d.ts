declare global {
  interface Window {
    __VG_DEV?: boolean;
    __VG_BOOT_TRACE?: Array<{ t: number; m: string }>;
    __vgLogLevel?: number | string;
    __vgEnv?: { ci?: boolean };
    /** Page-supplied overrides; validated by loadClientConfig. */
    __vgConfig?: unknown;
    /** Present when the htmx script is loaded on the page. */
    htmx?: {
      process(elt: Element): void;
    };
  }
}

export { };
