import { AutoLoad, Command, Declare } from "seyfert";

@Declare({
  name: "sync-admin",
  description: "Configure the cross-server sync network",
  defaultMemberPermissions: ["Administrator"],
  contexts: ["Guild"],
  integrationTypes: ["GuildInstall"],
})
@AutoLoad()
export default class SyncAdminParentCommand extends Command {}
