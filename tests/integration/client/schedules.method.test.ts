import { describe, expect, it } from 'vitest'
import { ConfigurationError } from '../../../src/core/errors.ts'
import type { TScheduleSettings } from '../../../src/types/api.ts'
import { createTestClient } from '../../helpers/client.ts'
import { makePage } from '../../helpers/factories.ts'

const settings: TScheduleSettings = {
  description: 'Nightly build',
  'attribution-actor': 'system',
  parameters: { branch: 'main' },
  timetable: { 'per-hour': 1, 'hours-of-day': [2], 'days-of-week': ['MON', 'TUE'] },
}

describe('CircleCI.schedules', () => {
  it('lists the schedules of a project', async () => {
    const { client, fetchMock } = createTestClient()
    fetchMock.pushJson(makePage([{ id: 'sch-1', name: 'nightly' }]))

    await expect(client.schedules.getSchedules('acme', 'api')).resolves.toEqual([
      { id: 'sch-1', name: 'nightly' },
    ])
    expect(fetchMock.lastCall().url).toBe(
      'https://circleci.test/api/v2/project/github/acme/api/schedule',
    )
  })

  it('rejects an org or repo that would break the project slug', async () => {
    const { client, fetchMock } = createTestClient()

    await expect(client.schedules.getSchedules('acme/tools', 'api')).rejects.toThrow(
      "Invalid project slug: 'github/acme/tools/api'",
    )
    await expect(
      client.schedules.addSchedule('acme', '', 'nightly', settings),
    ).rejects.toBeInstanceOf(ConfigurationError)
    expect(fetchMock.fetch).not.toHaveBeenCalled()
  })

  it('creates a schedule with its name in the body', async () => {
    const { client, fetchMock } = createTestClient()
    fetchMock.pushJson({ id: 'sch-1', name: 'nightly' }, { status: 201 })

    await client.schedules.addSchedule('acme', 'api', 'nightly', settings)

    const call = fetchMock.lastCall()
    expect(call.method).toBe('POST')
    expect(call.url).toBe('https://circleci.test/api/v2/project/github/acme/api/schedule')
    expect(call.body).toEqual({ ...settings, name: 'nightly' })
  })

  it('reads, updates and deletes a schedule', async () => {
    const { client, fetchMock } = createTestClient()
    fetchMock.pushJson({ id: 'sch-1', name: 'nightly' })
    fetchMock.pushJson({ id: 'sch-1', name: 'nightly' })
    fetchMock.pushJson({ message: 'Schedule deleted.' })

    await client.schedules.getSchedule('sch-1')
    await client.schedules.updateSchedule('sch-1', { description: 'Every night' })
    await client.schedules.deleteSchedule('sch-1')

    expect(fetchMock.calls.map((call) => `${call.method} ${call.url}`)).toEqual([
      'GET https://circleci.test/api/v2/schedule/sch-1',
      'PATCH https://circleci.test/api/v2/schedule/sch-1',
      'DELETE https://circleci.test/api/v2/schedule/sch-1',
    ])
    expect(fetchMock.calls[1]?.body).toEqual({ description: 'Every night' })
  })
})
