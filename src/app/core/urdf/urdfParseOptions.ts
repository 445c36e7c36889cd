export const DEFAULT_VENDOR_PREFIX = (process.env.URDF_VENDOR_PREFIX ?? "").trim() || "mb";

export type UrdfParseOptions = {
  /**
   * Namespace prefix of the non-standard tags and attributes (`<mb:joint>`, `mb:ignore`, ...).
   * Defaults to `URDF_VENDOR_PREFIX`, or `mb`.
   */
  vendorPrefix?: string;
  /**
   * Directory relative mesh and texture paths resolve against when the
   * document is in-memory text. File sources always use their own directory.
   */
  rootDir?: string;
};
