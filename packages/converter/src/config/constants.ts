/**
 * Converter defaults
 */
export const CONVERTER = {
  /**
   * Prefix of the staging directory created inside the output directory
   */
  STAGING_PREFIX: '.papertrans-staging-',

  /**
   * Directory inside staging that holds replaced output until publishing ends
   */
  BACKUP_DIR: '.previous',

  /**
   * Suffix of the image directory name (`<base>_images`)
   */
  IMAGE_DIR_SUFFIX: '_images',
} as const;
