import {fromSettings, headerName} from '../src/config.js'
import {generateNonce} from '../src/nonce.js'
import {PolicyBuilder} from '../src/policy-builder.js'
import {renderScriptTag} from '../src/script-tag.js'

const config = fromSettings({
  directives: {
    'script-src': ["'self'"],
    'img-src': ["'self'", 'data:'],
    'upgrade-insecure-requests': true,
    'report-uri': ['/csp-report'],
  },
  includeNonceIn: ['script-src'],
})

const builder = new PolicyBuilder(config)
const nonce = generateNonce()

const policy = builder.build({
  update: {'connect-src': ['https://api.example.com']},
  nonce,
})
console.log(`${headerName(config)}:`, policy)
console.log(renderScriptTag('<script>init()</script>', {nonce, defer: true}))
