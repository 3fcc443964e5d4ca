// Essential test setup configuration
import { clearGeometryLogs, setVerbosity } from '../logging/geometry-logger'
import { resetGeometryConfig } from '../config/geometry-config'

// Suppress console output in tests (unless SPATIAL_VERBOSE_TESTS is set)
const originalLog = console.log
const originalWarn = console.warn
const originalInfo = console.info
const originalDebug = console.debug

const isVerbose = process.env.SPATIAL_VERBOSE_TESTS === 'true'

beforeAll(() => {
  if (!isVerbose) {
    console.log = () => {}
    console.warn = () => {}
    console.info = () => {}
    console.debug = () => {}
  }
})

// Logger and config are module state; every test starts from the defaults
afterEach(() => {
  clearGeometryLogs()
  setVerbosity('normal')
  resetGeometryConfig()
})

afterAll(() => {
  console.log = originalLog
  console.warn = originalWarn
  console.info = originalInfo
  console.debug = originalDebug
})
