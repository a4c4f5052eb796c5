/**
 * Walks the pipeline -> workflow -> job hierarchy of one project.
 *
 * Prerequisites:
 * 1. Copy .env.example to .env and set CIRCLE_TOKEN
 * 2. Point PROJECT_ORG / PROJECT_REPO at a project the token can read
 *
 * Usage:
 *   npm run example
 */

import { config as loadEnv } from 'dotenv'
import { CircleCI } from '../src/client/circleci.ts'
import { APIError } from '../src/core/errors.ts'
import type { TVcsType } from '../src/core/types.ts'

loadEnv()

const vcsType: TVcsType = process.env.PROJECT_VCS === 'bitbucket' ? 'bitbucket' : 'github'

const CONFIG = {
  org: process.env.PROJECT_ORG ?? 'acme',
  repo: process.env.PROJECT_REPO ?? 'api',
  vcsType,
  pipelineLimit: Number(process.env.PIPELINE_LIMIT ?? 5),
}

async function main(): Promise<void> {
  const circleci = new CircleCI()

  const me = await circleci.user.getUserInfo('v2')
  console.log(`Signed in as ${me.login}`)

  const pipelines = await circleci.pipelines.getProjectPipelines(CONFIG.org, CONFIG.repo, {
    vcsType: CONFIG.vcsType,
    limit: CONFIG.pipelineLimit,
  })

  for (const pipeline of pipelines) {
    console.log(`#${pipeline.number} ${pipeline.state} (${pipeline.created_at})`)
    const workflows = await circleci.pipelines.getPipelineWorkflows(pipeline.id)
    for (const workflow of workflows) {
      const jobs = await circleci.workflows.getWorkflowJobs(workflow.id)
      const summary = jobs.map((job) => `${job.name}=${job.status}`).join(', ')
      console.log(`  ${workflow.name}: ${workflow.status} [${summary}]`)
    }
  }

  circleci.ppr()
}

main().catch((error: unknown) => {
  if (error instanceof APIError) {
    console.error(`CircleCI answered HTTP ${error.status} for ${error.method} ${error.url}`)
    console.error(error.body)
  } else {
    console.error(error)
  }
  process.exitCode = 1
})
