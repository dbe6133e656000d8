/**
 * Jest Setup File
 *
 * Environment for every test. Values are placeholders; nothing talks to a
 * real ShotGrid or FileMaker server.
 */
process.env.NODE_ENV = 'test'
process.env.LOG_SILENT = 'true'
process.env.LOG_FILE = 'false'
process.env.LOG_CONSOLE = 'false'

process.env.SG_URL = 'https://sg.test.local'
process.env.SG_SCRIPT_NAME = 'test-script'
process.env.SG_SCRIPT_KEY = 'test-secret'

process.env.FMP_BASE_URL = 'https://fm.test.local'
process.env.FMP_DATABASE = 'Editorial'
process.env.FMP_LAYOUT = 'Plates'
process.env.FMP_USER = 'test-user'
process.env.FMP_PASSWORD = 'test-password'
