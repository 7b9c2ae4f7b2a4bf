import { getBoolSetting, getSetting } from '../database/queries/settings'
import { createLogger } from '../util/logger'

const log = createLogger('notify')

interface NotifyOptions {
  title: string
  message: string
  priority?: 1 | 2 | 3 | 4 | 5
  tags?: string[]
}

export async function sendNotification(opts: NotifyOptions): Promise<boolean> {
  if (!getBoolSetting('notifications.enabled')) return false

  const topic = getSetting('notifications.ntfy_topic')
  if (!topic) {
    log.debug('Notification skipped: no ntfy topic configured')
    return false
  }

  const server = getSetting('notifications.ntfy_server') || 'https://ntfy.sh'
  const url = `${server.replace(/\/+$/, '')}/${encodeURIComponent(topic)}`

  try {
    const res = await fetch(url, {
      method: 'POST',
      headers: {
        'Title': opts.title,
        'Priority': String(opts.priority || 3),
        ...(opts.tags?.length ? { 'Tags': opts.tags.join(',') } : {})
      },
      body: opts.message
    })

    if (!res.ok) {
      log.warn(`ntfy POST failed: ${res.status} ${res.statusText}`)
      return false
    }

    log.info(`Notification sent: "${opts.title}"`)
    return true
  } catch (err) {
    log.warn(`ntfy send failed: ${err}`)
    return false
  }
}

/** Job-scoped notification; the job title prefixes the message body */
export async function notifyJob(job: { id: number; title: string }, title: string, body: string): Promise<void> {
  const sent = await sendNotification({ title, message: `${job.title}: ${body}`, tags: ['optical_disk'] })
  if (!sent) log.debug(`Job ${job.id}: notification "${title}" not delivered`)
}
