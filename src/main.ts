import "@nivinjoseph/n-ext";
import { EngineProvisionLogger } from "./logging/engine-provision-logger.js";
import { FileProvisionLogger } from "./logging/file-provision-logger.js";
import { StackConfig } from "./stack-config.js";
import type { StackOutputs } from "./stack/stack-outputs.js";
import { StackProvisioner } from "./stack/stack-provisioner.js";
import { loadStackSettings } from "./stack/stack-settings.js";


export default async function (): Promise<StackOutputs>
{
    const settings = loadStackSettings();

    StackConfig.configureLogger(new FileProvisionLogger(settings.logFile, new EngineProvisionLogger()));

    return new StackProvisioner(settings).provision();
}
