// Application-wide constants

export const APP_NAME = 'ripper-core'
export const APP_VERSION = '2.0.0'

export const DISC_TYPES = ['bluray', 'dvd', 'music', 'data', 'unknown'] as const
export type DiscType = (typeof DISC_TYPES)[number]

export const JOB_STATES = [
  'active',
  'video_waiting',
  'video_info',
  'video_ripping',
  'success',
  'fail'
] as const
export type JobState = (typeof JOB_STATES)[number]

export const RIP_METHODS = ['mkv', 'backup', 'backup_dvd'] as const
export type RipMethod = (typeof RIP_METHODS)[number]

export const DRIVE_MODES = ['auto', 'manual'] as const
export type DriveMode = (typeof DRIVE_MODES)[number]

/** Tag stored with every track found by a MakeMKV info query */
export const TRACK_SOURCE_MAKEMKV = 'MakeMKV'

export const SETTING_CATEGORIES = ['general', 'makemkv', 'rip', 'notifications', 'paths', 'tools'] as const
export type SettingCategory = (typeof SETTING_CATEGORIES)[number]

export const DEFAULT_SETTINGS: Record<string, { value: string; category: SettingCategory }> = {
  // General
  'general.log_level': { value: 'info', category: 'general' },

  // MakeMKV info throttling
  'makemkv.max_concurrent_info': { value: '1', category: 'makemkv' },
  'makemkv.info_wait_time': { value: '60', category: 'makemkv' },
  'makemkv.poll_interval': { value: '10', category: 'makemkv' },

  // Rip
  'rip.method': { value: 'mkv', category: 'rip' },
  'rip.mkv_args': { value: '', category: 'rip' },
  'rip.min_length': { value: '600', category: 'rip' },
  'rip.max_length': { value: '99999', category: 'rip' },
  'rip.main_feature': { value: 'false', category: 'rip' },

  // Notifications
  'notifications.enabled': { value: 'false', category: 'notifications' },
  'notifications.ntfy_topic': { value: '', category: 'notifications' },
  'notifications.ntfy_server': { value: 'https://ntfy.sh', category: 'notifications' },

  // Paths
  'paths.log': { value: '~/.ripper-core/logs', category: 'paths' },

  // Tools
  'tools.makemkvcon_path': { value: '', category: 'tools' }
}
