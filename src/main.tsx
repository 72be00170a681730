import { render } from 'ink'
import { loadConfig } from './config'
import { LevelCatalog, buildStandardLevels } from './games/components/games/snake/levels'
import { SnakeSession } from './games/components/games/snake/session'
import Snake from './games/components/games/snake/Snake'

const config = loadConfig()
const session = new SnakeSession({
  catalog: new LevelCatalog(buildStandardLevels(config.board)),
})

const app = render(<Snake session={session} />)

app.waitUntilExit()
  .then(() => {
    console.log('Thanks for playing Snake!')
  })
  .catch((error: unknown) => {
    console.error('Snake terminated unexpectedly:', error)
    process.exitCode = 1
  })
