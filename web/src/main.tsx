import { StrictMode } from 'react'
import { createRoot } from 'react-dom/client'
import { BrowserRouter } from 'react-router-dom'

import App from './App'
import { readConfig } from './config'
import { createServices } from './services'

const root = document.getElementById('root')
if (!root) {
  throw new Error('Missing #root element')
}

const services = createServices(readConfig(import.meta.env))

createRoot(root).render(
  <StrictMode>
    <BrowserRouter basename={import.meta.env.BASE_URL}>
      <App services={services} />
    </BrowserRouter>
  </StrictMode>,
)
