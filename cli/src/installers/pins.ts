export const NVM_MIN_VERSION = '0.39.7'
export const NVM_INSTALL_URL = `https://raw.githubusercontent.com/nvm-sh/nvm/v${NVM_MIN_VERSION}/install.sh`

export const NODE_MIN_VERSION = '18.0.0'
export const NODE_MAX_VERSION = '20.18.1'

// Steps ask nvm for the toolchain by this name, never by raw version.
export const TOOLCHAIN_ALIAS = 'iotbox'

export interface HelperProject {
  name: string
  url: string
}

export const HELPER_PROJECTS: readonly HelperProject[] = [
  { name: 'esptool', url: 'https://github.com/espressif/esptool.git' },
  { name: 'ampy', url: 'https://github.com/scientifichackers/ampy.git' }
]

export const BUILD_PLATFORMS = ['espressif32', 'espressif8266'] as const
